import type { SamplingOptions } from "../shared/types.js";
import type { CredentialLease } from "../pool/credential-pool.js";

export type SessionRequest = {
    credential: CredentialLease;
    prompt: string;
    /** Upstream model identifier, already resolved from the alias. */
    model: string;
    stream: boolean;
    sampling: SamplingOptions;
};

/**
 * Boundary to the upstream chat service. `send` yields text deltas in order
 * and throws a GatewayError (AuthExpired, RateLimited, NetworkError,
 * UpstreamError, UnknownModel, BadRequest) when the upstream fails.
 * Implementations must stop producing once `signal` aborts.
 */
export interface SessionAdapter {
    send(request: SessionRequest, signal: AbortSignal): AsyncIterable<string>;
}
