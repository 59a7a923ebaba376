/**
 * poolgate: main API
 *
 * Usage as library:
 *   import { loadConfig, createGatewayContext, startServer } from "poolgate";
 */

export { CredentialPool, MAX_CONSECUTIVE_ERRORS } from "./pool/credential-pool.js";
export type { CredentialRecord, CredentialLease, CredentialPoolOptions } from "./pool/credential-pool.js";
export {
    Dispatcher,
    RequestTranslator,
    StreamEncoder,
    createGatewayContext,
    messagesToPrompt,
    parseChatRequest,
    estimateTokens,
} from "./gateway/index.js";
export type {
    DispatchOutcome,
    DispatchState,
    DispatcherOptions,
    GatewayDeps,
    RequestEnvelope,
    StreamEnvelope,
} from "./gateway/index.js";
export type { SessionAdapter, SessionRequest } from "./upstream/session.js";
export { HttpSessionAdapter, classifyUpstreamStatus } from "./upstream/http-session.js";
export { loadConfig } from "./config/index.js";
export type { GatewayConfig } from "./config/index.js";
export { resolveCredentials, CREDENTIAL_SOURCES } from "./config/credentials.js";
export { createGatewayServer, startServer } from "./server/index.js";
export type { GatewayContext } from "./server/handlers.js";
export { findModel, getAllModels } from "./models/registry.js";
export type { ModelInfo, ModelTier } from "./models/registry.js";
export { openDatabase } from "./storage/db.js";
export { RequestLog } from "./storage/request-log.js";
export { GatewayError, isGatewayError } from "./shared/errors.js";
export type { GatewayErrorKind } from "./shared/errors.js";
export { logger, setLogLevel } from "./shared/logger.js";
export type {
    SecretPair,
    CredentialSeed,
    SelectionStrategy,
    PoolStatus,
    CredentialSnapshot,
    ChatMessage,
    ChatCompletionRequest,
    ChatCompletionResponse,
    ChatCompletionChunk,
    RequestStats,
} from "./shared/types.js";
