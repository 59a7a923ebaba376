import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";

import type { CredentialPool } from "../pool/credential-pool.js";
import type { Dispatcher } from "../gateway/dispatcher.js";
import type { RequestLog } from "../storage/request-log.js";
import type { RequestStats } from "../shared/types.js";
import { parseChatRequest, type RequestEnvelope, type RequestTranslator } from "../gateway/translator.js";
import { StreamEncoder, estimateTokens } from "../gateway/stream-encoder.js";
import { getAllModels } from "../models/registry.js";
import { GatewayError, isGatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import { SSE_DONE, doAuditLog, formatSse, readBody, sendError, sendJson } from "./helpers.js";

export const VERSION = "0.1.0";

/** Everything a handler needs; built once at startup and passed in. */
export type GatewayContext = {
    pool: CredentialPool;
    translator: RequestTranslator;
    dispatcher: Dispatcher;
    requestLog?: RequestLog;
};

function record(ctx: GatewayContext, stats: RequestStats): void {
    try {
        ctx.requestLog?.record(stats);
    } catch (err) {
        logger.error("Failed to record request stats:", err);
    }
    doAuditLog(stats);
}

async function readJson(req: IncomingMessage): Promise<unknown> {
    const bodyStr = await readBody(req);
    if (bodyStr.trim() === "") return undefined;
    try {
        return JSON.parse(bodyStr);
    } catch {
        throw new GatewayError("BadRequest", "Request body is not valid JSON");
    }
}

// ── Chat Completion Handler ─────────────────────────────────────────

export async function handleChatCompletion(
    ctx: GatewayContext,
    req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    const startTime = Date.now();
    let requestedModel = "unknown";
    let envelope: RequestEnvelope;

    try {
        const request = parseChatRequest(await readJson(req));
        requestedModel = request.model;
        envelope = ctx.translator.translate(request);
    } catch (err) {
        if (!isGatewayError(err)) throw err;
        sendError(res, err);
        record(ctx, {
            timestamp: Date.now(),
            model: requestedModel,
            credentialId: "none",
            attempts: 0,
            stream: false,
            latencyMs: Date.now() - startTime,
            promptTokens: 0,
            completionTokens: 0,
            success: false,
            error: err.kind,
        });
        return;
    }

    const controller = new AbortController();
    res.on("close", () => {
        if (!res.writableFinished) controller.abort();
    });

    const outcome = await ctx.dispatcher.dispatch(envelope, controller.signal);
    const base = {
        model: requestedModel,
        upstreamModel: envelope.model.upstreamId,
        attempts: outcome.attempts,
        stream: envelope.stream,
        promptTokens: estimateTokens(envelope.prompt),
    };

    if (outcome.status === "failed") {
        if (outcome.error.kind !== "Cancelled") {
            logger.error(`${outcome.error.kind}: ${outcome.error.message}`);
            sendError(res, outcome.error);
        }
        record(ctx, {
            ...base,
            timestamp: Date.now(),
            credentialId: outcome.credentialId ?? "none",
            latencyMs: Date.now() - startTime,
            completionTokens: 0,
            success: false,
            error: outcome.error.kind,
        });
        return;
    }

    const encoder = new StreamEncoder({
        id: `chatcmpl-${randomUUID().replace(/-/g, "")}`,
        model: requestedModel,
        created: Math.floor(Date.now() / 1000),
        prompt: envelope.prompt,
    });
    const routingHeaders = {
        "X-Poolgate-Credential": outcome.credentialId,
        "X-Poolgate-Attempts": String(outcome.attempts),
    };

    let failure: string | undefined;
    if (envelope.stream) {
        res.writeHead(200, {
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache",
            Connection: "keep-alive",
            ...routingHeaders,
        });
        for await (const env of encoder.stream(outcome.deltas, controller.signal)) {
            res.write(formatSse(env));
            if (env.chunk.error) failure = env.chunk.error.type;
        }
        if (controller.signal.aborted) {
            failure = "Cancelled";
        } else {
            res.write(SSE_DONE);
            res.end();
        }
    } else {
        const response = await encoder.collect(outcome.deltas);
        sendJson(res, 200, response, routingHeaders);
    }

    record(ctx, {
        ...base,
        timestamp: Date.now(),
        credentialId: outcome.credentialId,
        latencyMs: Date.now() - startTime,
        completionTokens: estimateTokens(encoder.text),
        success: failure === undefined,
        error: failure,
    });
}

// ── Models Handler ──────────────────────────────────────────────────

export async function handleModels(
    _ctx: GatewayContext,
    _req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    const data = getAllModels().map((m) => ({
        id: m.id,
        object: "model",
        created: 0,
        owned_by: m.ownedBy,
        name: m.name,
        tier: m.tier,
        deprecated: m.deprecated,
    }));
    sendJson(res, 200, { object: "list", data });
}

// ── Pool Handlers ───────────────────────────────────────────────────

export function poolStatusBody(pool: CredentialPool) {
    const status = pool.status();
    return {
        strategy: status.strategy,
        total_credentials: status.totalCredentials,
        available_credentials: status.availableCredentials,
        credentials: status.credentials.map((c) => ({
            id: c.id,
            display_name: c.displayName,
            is_available: c.isAvailable,
            error_count: c.errorCount,
            last_used: c.lastUsed > 0 ? new Date(c.lastUsed).toISOString() : null,
        })),
    };
}

export async function handlePoolStatus(
    ctx: GatewayContext,
    _req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    sendJson(res, 200, poolStatusBody(ctx.pool));
}

export async function handlePoolReset(
    ctx: GatewayContext,
    req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    const body = await readJson(req);
    let id: string | undefined;
    if (typeof body === "object" && body !== null && "id" in body) {
        if (typeof body.id !== "string") {
            throw new GatewayError("BadRequest", "id must be a string");
        }
        id = body.id;
    }

    if (!ctx.pool.reset(id)) {
        sendJson(res, 404, {
            error: { type: "NotFound", code: "credential_not_found", message: `Credential not found: ${id}` },
        });
        return;
    }
    sendJson(res, 200, poolStatusBody(ctx.pool));
}

// ── Stats Handler ───────────────────────────────────────────────────

export async function handleStats(
    ctx: GatewayContext,
    _req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    if (!ctx.requestLog) {
        sendJson(res, 404, {
            error: { type: "NotFound", code: "stats_disabled", message: "Request log is not enabled" },
        });
        return;
    }
    sendJson(res, 200, {
        summary: ctx.requestLog.summary(),
        requests: ctx.requestLog.recent(100),
    });
}

// ── Health / Root ───────────────────────────────────────────────────

export async function handleHealth(
    ctx: GatewayContext,
    _req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    const status = ctx.pool.status();
    const healthy = status.availableCredentials > 0;
    sendJson(res, healthy ? 200 : 503, {
        status: healthy ? "ok" : "unavailable",
        available_credentials: status.availableCredentials,
        total_credentials: status.totalCredentials,
    });
}

export async function handleRoot(
    _ctx: GatewayContext,
    _req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    sendJson(res, 200, {
        message: "poolgate",
        version: VERSION,
        endpoints: {
            chat_completions: "/v1/chat/completions",
            models: "/v1/models",
            pool_status: "/pool/status",
            pool_reset: "/pool/reset",
            stats: "/api/stats",
            health: "/health",
        },
    });
}
