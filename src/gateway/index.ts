import type { GatewayConfig } from "../config/index.js";
import type { GatewayContext } from "../server/handlers.js";
import type { SessionAdapter } from "../upstream/session.js";
import { CredentialPool } from "../pool/credential-pool.js";
import { HttpSessionAdapter } from "../upstream/http-session.js";
import { openDatabase } from "../storage/db.js";
import { RequestLog } from "../storage/request-log.js";
import { Dispatcher, type DispatchState } from "./dispatcher.js";
import { RequestTranslator } from "./translator.js";

export { Dispatcher, raceAbort, DEFAULT_SEND_TIMEOUT_MS } from "./dispatcher.js";
export type { DispatchOutcome, DispatchState, DispatcherOptions, Deltas } from "./dispatcher.js";
export { RequestTranslator, messagesToPrompt, parseChatRequest } from "./translator.js";
export type { RequestEnvelope } from "./translator.js";
export { StreamEncoder, estimateTokens, usageFor } from "./stream-encoder.js";
export type { StreamEnvelope, EncoderMeta } from "./stream-encoder.js";

export type GatewayDeps = {
    adapter?: SessionAdapter;
    /** Pass false to run without the SQLite request log. */
    requestLog?: RequestLog | false;
    onTransition?: (state: DispatchState) => void;
};

/**
 * Composition root: one pool per process, injected into everything that
 * needs it.
 */
export function createGatewayContext(config: GatewayConfig, deps: GatewayDeps = {}): GatewayContext {
    const pool = new CredentialPool(config.credentials, { strategy: config.strategy });
    const adapter = deps.adapter ?? new HttpSessionAdapter({ url: config.upstreamUrl });
    const dispatcher = new Dispatcher(pool, adapter, {
        maxAttempts: config.maxAttempts,
        sendTimeoutMs: config.sendTimeoutMs,
        onTransition: deps.onTransition,
    });
    const requestLog = deps.requestLog === false
        ? undefined
        : deps.requestLog ?? new RequestLog(openDatabase(config.dbPath));

    return { pool, translator: new RequestTranslator(), dispatcher, requestLog };
}
