import type { DatabaseType } from "./db.js";
import type { RequestStats } from "../shared/types.js";

export type StatsSummary = {
    totalRequests: number;
    totalTokens: number;
    successRate: number;
    avgLatencyMs: number;
    credentialBreakdown: Record<string, number>;
};

type RequestRow = {
    timestamp: number;
    model: string;
    upstream_model: string | null;
    credential_id: string;
    attempts: number;
    stream: number;
    latency_ms: number | null;
    prompt_tokens: number | null;
    completion_tokens: number | null;
    success: number;
    error_msg: string | null;
};

export class RequestLog {
    constructor(private readonly db: DatabaseType) {}

    record(req: RequestStats): void {
        const insert = this.db.prepare(`
            INSERT INTO requests (
                timestamp, model, upstream_model, credential_id, attempts, stream,
                latency_ms, prompt_tokens, completion_tokens, success, error_msg
            ) VALUES (
                @timestamp, @model, @upstreamModel, @credentialId, @attempts, @stream,
                @latencyMs, @promptTokens, @completionTokens, @success, @error
            )
        `);

        insert.run({
            timestamp: req.timestamp,
            model: req.model,
            upstreamModel: req.upstreamModel ?? null,
            credentialId: req.credentialId,
            attempts: req.attempts,
            stream: req.stream ? 1 : 0,
            latencyMs: req.latencyMs,
            promptTokens: req.promptTokens,
            completionTokens: req.completionTokens,
            success: req.success ? 1 : 0,
            error: req.error ?? null,
        });
    }

    /** Most recent first. */
    recent(limit = 100): RequestStats[] {
        const rows = this.db
            .prepare<[number], RequestRow>(`
                SELECT * FROM requests
                ORDER BY timestamp DESC, id DESC
                LIMIT ?
            `)
            .all(limit);

        return rows.map((row) => ({
            timestamp: row.timestamp,
            model: row.model,
            upstreamModel: row.upstream_model ?? undefined,
            credentialId: row.credential_id,
            attempts: row.attempts,
            stream: row.stream === 1,
            latencyMs: row.latency_ms ?? 0,
            promptTokens: row.prompt_tokens ?? 0,
            completionTokens: row.completion_tokens ?? 0,
            success: row.success === 1,
            error: row.error_msg ?? undefined,
        }));
    }

    summary(): StatsSummary {
        const totals = this.db
            .prepare<[], { count: number; tokens: number | null; latency: number | null; ok: number | null }>(`
                SELECT COUNT(*) AS count,
                       SUM(prompt_tokens + completion_tokens) AS tokens,
                       AVG(latency_ms) AS latency,
                       SUM(success) AS ok
                FROM requests
            `)
            .get();

        const breakdown = this.db
            .prepare<[], { credential_id: string; count: number }>(
                "SELECT credential_id, COUNT(*) AS count FROM requests GROUP BY credential_id",
            )
            .all();
        const credentialMap: Record<string, number> = {};
        for (const b of breakdown) {
            credentialMap[b.credential_id] = b.count;
        }

        const count = totals?.count ?? 0;
        return {
            totalRequests: count,
            totalTokens: totals?.tokens ?? 0,
            successRate: count > 0 ? (totals?.ok ?? 0) / count : 1,
            avgLatencyMs: Math.round(totals?.latency ?? 0),
            credentialBreakdown: credentialMap,
        };
    }
}
