import type { CredentialLease, CredentialPool } from "../pool/credential-pool.js";
import type { SessionAdapter } from "../upstream/session.js";
import type { RequestEnvelope } from "./translator.js";
import { GatewayError, errorMessage, isGatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

export const DEFAULT_SEND_TIMEOUT_MS = 60_000;

export type Deltas = AsyncGenerator<string, void, undefined>;

export type DispatchState =
    | { name: "selecting"; attempts: number }
    | { name: "sending"; attempts: number; credentialId: string }
    | { name: "retrying"; attempts: number; credentialId: string; error: GatewayError }
    | { name: "succeeded"; attempts: number; credentialId: string }
    | { name: "failed"; attempts: number; error: GatewayError };

export type DispatchOutcome =
    | {
        status: "succeeded";
        credentialId: string;
        displayName: string;
        attempts: number;
        deltas: Deltas;
    }
    | {
        status: "failed";
        attempts: number;
        error: GatewayError;
        credentialId?: string;
    };

export type DispatcherOptions = {
    /** Attempt bound per request; defaults to the number of registered credentials. */
    maxAttempts?: number;
    /**
     * Time to the whole reply when not streaming. When streaming, time to the
     * first delta and then the longest gap between deltas.
     */
    sendTimeoutMs?: number;
    onTransition?: (state: DispatchState) => void;
};

type AttemptResult =
    | { ok: true; deltas: Deltas }
    | { ok: false; error: GatewayError };

/**
 * Drives one request through select → send → classify, rotating credentials
 * on retryable failures until it succeeds or runs out of attempts.
 */
export class Dispatcher {
    private readonly maxAttempts?: number;
    private readonly sendTimeoutMs: number;
    private readonly onTransition?: (state: DispatchState) => void;

    constructor(
        private readonly pool: CredentialPool,
        private readonly adapter: SessionAdapter,
        options: DispatcherOptions = {},
    ) {
        this.maxAttempts = options.maxAttempts;
        this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
        this.onTransition = options.onTransition;
    }

    async dispatch(envelope: RequestEnvelope, signal?: AbortSignal): Promise<DispatchOutcome> {
        const maxAttempts = this.maxAttempts ?? this.pool.size;
        let attempts = 0;
        let lease: CredentialLease | undefined;
        let deltas: Deltas | undefined;
        let lastError: GatewayError | undefined;
        let state: DispatchState = { name: "selecting", attempts };

        for (;;) {
            this.enter(state);
            switch (state.name) {
                case "selecting": {
                    if (signal?.aborted) {
                        state = { name: "failed", attempts, error: cancelled() };
                        break;
                    }
                    try {
                        lease = this.pool.select(envelope.tried);
                    } catch (err) {
                        if (!isGatewayError(err) || err.kind !== "Exhausted") throw err;
                        const suffix = lastError ? ` Last error: ${lastError.message}` : "";
                        state = {
                            name: "failed",
                            attempts,
                            error: new GatewayError(
                                "AllCredentialsExhausted",
                                `All credentials are unavailable or already tried for this request.${suffix}`,
                                { cause: lastError, context: { attempts } },
                            ),
                        };
                        break;
                    }
                    state = { name: "sending", attempts, credentialId: lease.id };
                    break;
                }

                case "sending": {
                    const current: CredentialLease | undefined = lease;
                    if (!current) throw new Error("sending without a selected credential");
                    attempts++;
                    const result = await this.attempt(current, envelope, signal);
                    if (result.ok) {
                        deltas = result.deltas;
                        state = { name: "succeeded", attempts, credentialId: current.id };
                    } else if (result.error.kind === "Cancelled" || !result.error.retryable) {
                        state = { name: "failed", attempts, error: result.error };
                    } else {
                        lastError = result.error;
                        this.pool.reportFailure(current.id);
                        envelope.tried.add(current.id);
                        logger.warn(
                            `${current.displayName} (${current.id}) failed: ${result.error.kind}: ${result.error.message}`,
                        );
                        state = { name: "retrying", attempts, credentialId: current.id, error: result.error };
                    }
                    break;
                }

                case "retrying":
                    if (attempts < maxAttempts) {
                        state = { name: "selecting", attempts };
                    } else {
                        state = {
                            name: "failed",
                            attempts,
                            error: new GatewayError(
                                "RetriesExhausted",
                                `Gave up after ${attempts} attempt(s). Last error: ${state.error.message}`,
                                { cause: state.error, context: { attempts } },
                            ),
                        };
                    }
                    break;

                case "succeeded": {
                    if (!lease || !deltas) throw new Error("succeeded without a reply");
                    return {
                        status: "succeeded",
                        credentialId: lease.id,
                        displayName: lease.displayName,
                        attempts,
                        deltas,
                    };
                }

                case "failed":
                    return { status: "failed", attempts, error: state.error, credentialId: lease?.id };
            }
        }
    }

    private enter(state: DispatchState): void {
        logger.debug(`dispatch → ${state.name} (attempts=${state.attempts})`);
        this.onTransition?.(state);
    }

    private async attempt(
        lease: CredentialLease,
        envelope: RequestEnvelope,
        clientSignal?: AbortSignal,
    ): Promise<AttemptResult> {
        const controller = new AbortController();
        const onClientAbort = () => controller.abort(cancelled());
        if (clientSignal?.aborted) {
            onClientAbort();
        } else {
            clientSignal?.addEventListener("abort", onClientAbort, { once: true });
        }
        const timer = setTimeout(() => {
            controller.abort(
                new GatewayError("Timeout", `No reply from upstream within ${this.sendTimeoutMs}ms`),
            );
        }, this.sendTimeoutMs);
        const release = () => {
            clearTimeout(timer);
            clientSignal?.removeEventListener("abort", onClientAbort);
        };

        let iterator: AsyncIterator<string> | undefined;
        try {
            const reply = this.adapter.send(
                {
                    credential: lease,
                    prompt: envelope.prompt,
                    model: envelope.model.upstreamId,
                    stream: envelope.stream,
                    sampling: envelope.sampling,
                },
                controller.signal,
            );
            iterator = reply[Symbol.asyncIterator]();

            if (envelope.stream) {
                const first = await raceAbort(iterator.next(), controller.signal);
                clearTimeout(timer);
                return { ok: true, deltas: this.relay(lease, first, iterator, controller, release) };
            }

            const parts: string[] = [];
            for (;;) {
                const step = await raceAbort(iterator.next(), controller.signal);
                if (step.done) break;
                parts.push(step.value);
            }
            release();
            this.pool.reportSuccess(lease.id);
            return { ok: true, deltas: replay(parts) };
        } catch (err) {
            release();
            const error = classify(err, controller.signal);
            if (!controller.signal.aborted) controller.abort(error);
            if (iterator) void closeIterator(iterator);
            return { ok: false, error };
        }
    }

    /**
     * Hand a committed stream to the caller. The credential is settled when
     * the stream settles. An upstream error or a stall longer than the send
     * timeout counts as a failure; an early stop by the consumer counts as
     * nothing.
     */
    private async *relay(
        lease: CredentialLease,
        first: IteratorResult<string>,
        iterator: AsyncIterator<string>,
        controller: AbortController,
        release: () => void,
    ): Deltas {
        let settled = false;
        const next = () => {
            const idle = setTimeout(() => {
                controller.abort(
                    new GatewayError("Timeout", `Upstream stream stalled for ${this.sendTimeoutMs}ms`),
                );
            }, this.sendTimeoutMs);
            return raceAbort(iterator.next(), controller.signal).finally(() => clearTimeout(idle));
        };
        try {
            let step = first;
            while (!step.done) {
                yield step.value;
                step = await next();
            }
            settled = true;
            this.pool.reportSuccess(lease.id);
        } catch (err) {
            settled = true;
            const error = classify(err, controller.signal);
            if (error.kind !== "Cancelled" && error.retryable) {
                this.pool.reportFailure(lease.id);
                logger.warn(`${lease.displayName} (${lease.id}) failed mid-stream: ${error.kind}: ${error.message}`);
            }
            throw error;
        } finally {
            release();
            if (!settled) {
                controller.abort(cancelled());
                void closeIterator(iterator);
            }
        }
    }
}

// ── Helpers ─────────────────────────────────────────────────────────

function cancelled(): GatewayError {
    return new GatewayError("Cancelled", "Request cancelled by client");
}

/** Abort reasons we set ourselves win over whatever the adapter threw in response. */
function classify(err: unknown, signal: AbortSignal): GatewayError {
    if (signal.aborted && isGatewayError(signal.reason)) return signal.reason;
    if (isGatewayError(err)) return err;
    return new GatewayError("UpstreamError", errorMessage(err), { cause: err, transient: true });
}

export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        promise.catch((err) => logger.debug(`Ignored result after abort: ${errorMessage(err)}`));
        return Promise.reject(signal.reason);
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (err) => {
                signal.removeEventListener("abort", onAbort);
                reject(err);
            },
        );
    });
}

async function* replay(parts: readonly string[]): Deltas {
    yield* parts;
}

async function closeIterator(iterator: AsyncIterator<string>): Promise<void> {
    try {
        await iterator.return?.();
    } catch (err) {
        logger.debug(`Upstream stream did not close cleanly: ${errorMessage(err)}`);
    }
}
