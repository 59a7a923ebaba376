import type { IncomingMessage, ServerResponse } from "node:http";
import type { RequestStats } from "../shared/types.js";
import type { StreamEnvelope } from "../gateway/stream-encoder.js";
import type { GatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

// ── Request body parsing ────────────────────────────────────────────

export function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on("data", (c: Buffer) => chunks.push(c));
        req.on("end", () => resolve(Buffer.concat(chunks).toString()));
        req.on("error", reject);
    });
}

// ── Responses ───────────────────────────────────────────────────────

export function sendJson(
    res: ServerResponse,
    status: number,
    payload: unknown,
    headers: Record<string, string> = {},
): void {
    res.writeHead(status, { "Content-Type": "application/json", ...headers });
    res.end(JSON.stringify(payload));
}

export function sendError(res: ServerResponse, error: GatewayError): void {
    if (res.headersSent) return;
    const headers: Record<string, string> = {};
    if (error.kind === "AllCredentialsExhausted") headers["Retry-After"] = "5";
    sendJson(res, error.status, error.toJSON(), headers);
}

/** SSE frame; the envelope sequence number doubles as the event id. */
export function formatSse(envelope: StreamEnvelope): string {
    return `id: ${envelope.seq}\ndata: ${JSON.stringify(envelope.chunk)}\n\n`;
}

export const SSE_DONE = "data: [DONE]\n\n";

// ── Auditing ────────────────────────────────────────────────────────

export function doAuditLog(stats: RequestStats) {
    const modelDisplay =
        stats.upstreamModel && stats.upstreamModel !== stats.model
            ? `\x1b[36m${stats.model}\x1b[0m \x1b[90m→ ${stats.upstreamModel}\x1b[0m`
            : `\x1b[36m${stats.model}\x1b[0m`;

    logger.audit(
        `Model: ${modelDisplay} | ` +
        `Acc: ${stats.credentialId} | ` +
        `Attempts: ${stats.attempts} | ` +
        `${stats.stream ? "stream" : "json"} ${stats.latencyMs}ms | ` +
        `Tokens: ${stats.promptTokens}/${stats.completionTokens} | ` +
        `Status: ${stats.success ? "\x1b[32mOK\x1b[0m" : "\x1b[31mERR\x1b[0m"}${stats.error ? ` (${stats.error})` : ""}`,
    );
}
