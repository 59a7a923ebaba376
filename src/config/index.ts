import type { CredentialSeed, SelectionStrategy } from "../shared/types.js";
import { SELECTION_STRATEGIES } from "../shared/types.js";
import { GatewayError } from "../shared/errors.js";
import { isLogLevel, type LogLevel } from "../shared/logger.js";
import { DEFAULT_SEND_TIMEOUT_MS } from "../gateway/dispatcher.js";
import { resolveCredentials, type Env } from "./credentials.js";

export const DEFAULT_PORT = 50014;
export const DEFAULT_DB_PATH = "data/poolgate.db";
export const DEFAULT_UPSTREAM_URL = "http://localhost:8081/generate";

export type GatewayConfig = {
    port: number;
    host: string;
    strategy: SelectionStrategy;
    maxAttempts?: number;
    sendTimeoutMs: number;
    upstreamUrl: string;
    dbPath: string;
    logLevel: LogLevel;
    credentialSource: string | null;
    credentials: CredentialSeed[];
};

function isStrategy(value: string): value is SelectionStrategy {
    return SELECTION_STRATEGIES.some((s) => s === value);
}

function parseInteger(
    raw: string | undefined,
    label: string,
    min: number,
    max?: number,
): number | undefined {
    const trimmed = raw?.trim();
    if (!trimmed) return undefined;
    const value = Number(trimmed);
    if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
        const range = max === undefined ? `>= ${min}` : `between ${min} and ${max}`;
        throw new GatewayError("ConfigError", `${label} must be an integer ${range}, got "${trimmed}"`);
    }
    return value;
}

function readInt(env: Env, key: string, min: number): number | undefined {
    return parseInteger(env[key], key, min);
}

/** Validate a listen port from the environment or a CLI flag; undefined when unset. */
export function parsePort(raw: string | undefined, label: string): number | undefined {
    return parseInteger(raw, label, 0, 65535);
}

/**
 * Build the gateway configuration from an environment record. Throws
 * ConfigError for invalid settings and when no credential source is usable.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
    const strategy = env.POOLGATE_STRATEGY?.trim() || "round_robin";
    if (!isStrategy(strategy)) {
        throw new GatewayError(
            "ConfigError",
            `POOLGATE_STRATEGY must be one of ${SELECTION_STRATEGIES.join(", ")}, got "${strategy}"`,
        );
    }

    const logLevel = env.POOLGATE_LOG_LEVEL?.trim() || "info";
    if (!isLogLevel(logLevel)) {
        throw new GatewayError("ConfigError", `POOLGATE_LOG_LEVEL "${logLevel}" is not a log level`);
    }

    const { source, seeds } = resolveCredentials(env);
    if (seeds.length === 0) {
        throw new GatewayError(
            "ConfigError",
            "No credentials found. Set POOLGATE_CREDENTIALS_JSON, CREDENTIAL_1_PRIMARY or SECRET_PRIMARY.",
        );
    }

    return {
        port: parsePort(env.POOLGATE_PORT, "POOLGATE_PORT") ?? DEFAULT_PORT,
        host: env.POOLGATE_HOST?.trim() || "0.0.0.0",
        strategy,
        maxAttempts: readInt(env, "POOLGATE_MAX_ATTEMPTS", 1),
        sendTimeoutMs: readInt(env, "POOLGATE_SEND_TIMEOUT_MS", 1) ?? DEFAULT_SEND_TIMEOUT_MS,
        upstreamUrl: env.POOLGATE_UPSTREAM_URL?.trim() || DEFAULT_UPSTREAM_URL,
        dbPath: env.POOLGATE_DB_PATH?.trim() || DEFAULT_DB_PATH,
        logLevel,
        credentialSource: source,
        credentials: seeds,
    };
}
