import type { SecretPair } from "../shared/types.js";
import type { SessionAdapter, SessionRequest } from "./session.js";
import { GatewayError, errorMessage, isGatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

// Set to true to log raw upstream events to console
const DEBUG_RAW = process.env.DEBUG_RAW === "1";

export type HttpSessionOptions = {
    url: string;
    fetch?: typeof fetch;
};

export function buildCookieHeader(secrets: SecretPair): string {
    const parts = [`__Secure-1PSID=${secrets.primary}`];
    if (secrets.secondary) parts.push(`__Secure-1PSIDTS=${secrets.secondary}`);
    return parts.join("; ");
}

/**
 * Map a failed upstream reply to a gateway error kind. 429 and the client
 * error codes decide on their own; otherwise rate-limit wording in the body
 * wins over the status.
 */
export function classifyUpstreamStatus(status: number, body: string): GatewayError {
    const detail = `Upstream returned ${status}: ${body.slice(0, 200)}`;
    const lower = body.toLowerCase();

    if (status === 429) {
        return new GatewayError("RateLimited", detail, { context: { status } });
    }
    // Client errors keep their own kind whatever the body says.
    if (status === 400 || status === 422) {
        return new GatewayError("BadRequest", detail, { context: { status } });
    }
    if (status === 404) {
        return new GatewayError("UnknownModel", detail, { context: { status } });
    }
    if (
        lower.includes("rate_limit") ||
        lower.includes("too many requests") ||
        lower.includes("quota_exceeded") ||
        lower.includes("exhausted")
    ) {
        return new GatewayError("RateLimited", detail, { context: { status } });
    }
    if (status === 401 || status === 403) {
        return new GatewayError("AuthExpired", detail, { context: { status } });
    }
    if (status === 408 || status === 504) {
        return new GatewayError("Timeout", detail, { context: { status } });
    }
    return new GatewayError("UpstreamError", detail, {
        transient: status >= 500 || status === 409,
        context: { status },
    });
}

function readEvent(data: string): string {
    let event: unknown;
    try {
        event = JSON.parse(data);
    } catch (err) {
        throw new GatewayError("UpstreamError", `Unparseable upstream event: ${data.slice(0, 120)}`, {
            cause: err,
            transient: true,
        });
    }
    if (typeof event !== "object" || event === null) return "";
    if ("error" in event && event.error !== undefined && event.error !== null) {
        const message = typeof event.error === "string" ? event.error : JSON.stringify(event.error);
        throw new GatewayError("UpstreamError", `Upstream error event: ${message}`, { transient: true });
    }
    return "text" in event && typeof event.text === "string" ? event.text : "";
}

/**
 * Default upstream session: one HTTP POST per send, the secret pair carried
 * as session cookies. Replies are either SSE (`data: {"text": ...}` events
 * ending with `data: [DONE]`) or a single JSON `{ "text": ... }` body.
 */
export class HttpSessionAdapter implements SessionAdapter {
    private readonly url: string;
    private readonly fetchImpl: typeof fetch;

    constructor(options: HttpSessionOptions) {
        this.url = options.url;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async *send(request: SessionRequest, signal: AbortSignal): AsyncGenerator<string, void, undefined> {
        let upstream: Response;
        try {
            upstream = await this.fetchImpl(this.url, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    Accept: request.stream ? "text/event-stream" : "application/json",
                    Cookie: buildCookieHeader(request.credential.secrets),
                },
                body: JSON.stringify({
                    model: request.model,
                    prompt: request.prompt,
                    stream: request.stream,
                    ...request.sampling,
                }),
                signal,
            });
        } catch (err) {
            if (signal.aborted) throw signal.reason;
            throw new GatewayError("NetworkError", `Upstream unreachable: ${errorMessage(err)}`, { cause: err });
        }

        const contentType = upstream.headers.get("Content-Type") ?? "";
        logger.debug(`→ POST ${this.url} (${upstream.status}) [${contentType}] as ${request.credential.id}`);

        if (!upstream.ok) {
            const errText = await upstream.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);
            throw classifyUpstreamStatus(upstream.status, errText);
        }

        if (!contentType.includes("event-stream") || !upstream.body) {
            const text = await upstream.text();
            yield readEvent(text);
            return;
        }

        yield* this.readSse(upstream.body, signal);
    }

    private async *readSse(
        body: NonNullable<Response["body"]>,
        signal: AbortSignal,
    ): AsyncGenerator<string, void, undefined> {
        const reader = body.getReader();
        const decoder = new TextDecoder();
        let sseBuffer = "";

        try {
            while (true) {
                const chunk = await reader.read().catch((err: unknown) => {
                    if (signal.aborted) throw signal.reason;
                    if (isGatewayError(err)) throw err;
                    throw new GatewayError("NetworkError", `Upstream stream broke: ${errorMessage(err)}`, {
                        cause: err,
                    });
                });
                if (chunk.done) {
                    const pending = sseBuffer.trim() ? ` (${sseBuffer.length} unparsed bytes)` : "";
                    throw new GatewayError("NetworkError", `Upstream stream ended before [DONE]${pending}`);
                }

                const text = decoder.decode(chunk.value, { stream: true });
                if (DEBUG_RAW) console.log("RAW STREAM:", text);
                sseBuffer += text.replace(/\r\n/g, "\n");

                let idx = sseBuffer.indexOf("\n\n");
                while (idx !== -1) {
                    const event = sseBuffer.slice(0, idx);
                    sseBuffer = sseBuffer.slice(idx + 2);
                    idx = sseBuffer.indexOf("\n\n");

                    const dataLines = event
                        .split("\n")
                        .filter((l) => l.startsWith("data:"))
                        .map((l) => l.slice(5).trim());

                    for (const data of dataLines) {
                        if (data === "[DONE]") return;
                        const delta = readEvent(data);
                        if (delta) yield delta;
                    }
                }
            }
        } finally {
            reader.releaseLock();
            if (!signal.aborted) {
                await body.cancel().catch((err: unknown) => {
                    logger.debug(`Upstream body cancel failed: ${errorMessage(err)}`);
                });
            }
        }
    }
}
