import type {
    ChatCompletionChunk,
    ChatCompletionResponse,
    FinishReason,
    Usage,
} from "../shared/types.js";
import { GatewayError, errorMessage, isGatewayError } from "../shared/errors.js";

/** One unit of streamed output; `seq` increases by one per envelope. */
export type StreamEnvelope = {
    seq: number;
    chunk: ChatCompletionChunk;
};

export type EncoderMeta = {
    id: string;
    model: string;
    created: number;
    prompt: string;
};

/** Whitespace word count; the upstream reports no token usage of its own. */
export function estimateTokens(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
}

export function usageFor(prompt: string, completion: string): Usage {
    const promptTokens = estimateTokens(prompt);
    const completionTokens = estimateTokens(completion);
    return {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
    };
}

export class StreamEncoder {
    private completion = "";

    constructor(private readonly meta: EncoderMeta) {}

    /** Text emitted so far (streaming) or the full body (after `collect`). */
    get text(): string {
        return this.completion;
    }

    /**
     * Lazily turn deltas into envelopes: one per non-empty delta, then a
     * single terminal envelope (finish or error). Stops without a terminal
     * envelope once `signal` aborts; breaking out of the loop closes the
     * delta source.
     */
    async *stream(deltas: AsyncIterable<string>, signal?: AbortSignal): AsyncGenerator<StreamEnvelope, void, undefined> {
        let seq = 0;
        try {
            for await (const delta of deltas) {
                if (signal?.aborted) return;
                if (delta === "") continue;
                this.completion += delta;
                const position = seq++;
                yield {
                    seq: position,
                    chunk: this.chunk(
                        position === 0 ? { role: "assistant", content: delta } : { content: delta },
                        null,
                    ),
                };
            }
        } catch (err) {
            if (signal?.aborted || (isGatewayError(err) && err.kind === "Cancelled")) return;
            const error = isGatewayError(err)
                ? err
                : new GatewayError("UpstreamError", errorMessage(err), { cause: err });
            yield {
                seq: seq++,
                chunk: {
                    ...this.chunk({}, "error"),
                    error: { type: error.kind, message: error.message },
                },
            };
            return;
        }
        if (signal?.aborted) return;
        yield {
            seq: seq++,
            chunk: { ...this.chunk({}, "stop"), usage: usageFor(this.meta.prompt, this.completion) },
        };
    }

    /** Drain every delta into one complete response. */
    async collect(deltas: AsyncIterable<string>): Promise<ChatCompletionResponse> {
        const parts: string[] = [];
        for await (const delta of deltas) {
            parts.push(delta);
        }
        this.completion = parts.join("");
        return {
            id: this.meta.id,
            object: "chat.completion",
            created: this.meta.created,
            model: this.meta.model,
            choices: [
                {
                    index: 0,
                    message: { role: "assistant", content: this.completion },
                    finish_reason: "stop",
                },
            ],
            usage: usageFor(this.meta.prompt, this.completion),
        };
    }

    private chunk(
        delta: ChatCompletionChunk["choices"][number]["delta"],
        finishReason: FinishReason | null,
    ): ChatCompletionChunk {
        return {
            id: this.meta.id,
            object: "chat.completion.chunk",
            created: this.meta.created,
            model: this.meta.model,
            choices: [{ index: 0, delta, finish_reason: finishReason }],
        };
    }
}
