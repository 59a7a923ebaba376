// ── Error taxonomy ──────────────────────────────────────────────────

export type GatewayErrorKind =
    | "ConfigError"
    | "DuplicateCredential"
    | "BadRequest"
    | "UnknownModel"
    | "Exhausted"
    | "AllCredentialsExhausted"
    | "RetriesExhausted"
    | "AuthExpired"
    | "RateLimited"
    | "NetworkError"
    | "Timeout"
    | "UpstreamError"
    | "Cancelled";

type KindInfo = {
    status: number;
    code: string;
    retryable: boolean;
};

const KINDS: Record<GatewayErrorKind, KindInfo> = {
    ConfigError: { status: 500, code: "config_error", retryable: false },
    DuplicateCredential: { status: 500, code: "duplicate_credential", retryable: false },
    BadRequest: { status: 400, code: "invalid_request", retryable: false },
    UnknownModel: { status: 404, code: "model_not_found", retryable: false },
    Exhausted: { status: 503, code: "pool_exhausted", retryable: false },
    AllCredentialsExhausted: { status: 503, code: "all_credentials_exhausted", retryable: false },
    RetriesExhausted: { status: 502, code: "retries_exhausted", retryable: false },
    AuthExpired: { status: 502, code: "upstream_auth_expired", retryable: true },
    RateLimited: { status: 429, code: "upstream_rate_limited", retryable: true },
    NetworkError: { status: 502, code: "upstream_network_error", retryable: true },
    Timeout: { status: 504, code: "upstream_timeout", retryable: true },
    UpstreamError: { status: 502, code: "upstream_error", retryable: true },
    Cancelled: { status: 499, code: "client_cancelled", retryable: false },
};

export type GatewayErrorOptions = {
    /** Overrides the kind's default; only meaningful for UpstreamError. */
    transient?: boolean;
    status?: number;
    cause?: unknown;
    context?: Record<string, unknown>;
};

/**
 * Single error type for everything the gateway reports. `kind` drives retry
 * decisions in the dispatcher and the HTTP status in the server.
 */
export class GatewayError extends Error {
    readonly name = "GatewayError";
    readonly kind: GatewayErrorKind;
    readonly code: string;
    readonly status: number;
    readonly retryable: boolean;
    readonly context: Record<string, unknown>;

    constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        const info = KINDS[kind];
        this.kind = kind;
        this.code = info.code;
        this.status = options.status ?? info.status;
        this.retryable = kind === "UpstreamError" && options.transient !== undefined
            ? options.transient
            : info.retryable;
        this.context = options.context ?? {};
    }

    toJSON(): { error: { type: GatewayErrorKind; code: string; message: string } } {
        return {
            error: {
                type: this.kind,
                code: this.code,
                message: this.message,
            },
        };
    }
}

export function isGatewayError(err: unknown): err is GatewayError {
    return err instanceof GatewayError;
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
