import type {
    ChatCompletionRequest,
    ChatMessage,
    ChatRole,
    SamplingOptions,
} from "../shared/types.js";
import { GatewayError } from "../shared/errors.js";
import { findModel, getModelIds, type ModelInfo } from "../models/registry.js";

export type RequestEnvelope = {
    prompt: string;
    model: ModelInfo;
    stream: boolean;
    sampling: SamplingOptions;
    /** Credential ids already tried for this request. */
    tried: Set<string>;
};

const ROLE_LABELS: Record<ChatRole, string> = {
    system: "System",
    user: "User",
    assistant: "Assistant",
};

/** One "<Role>: <content>" block per message, blank line between them. */
export function messagesToPrompt(messages: readonly ChatMessage[]): string {
    return messages.map((m) => `${ROLE_LABELS[m.role]}: ${m.content}`).join("\n\n");
}

export type ModelLookup = (alias: string) => ModelInfo | undefined;

export class RequestTranslator {
    constructor(private readonly lookup: ModelLookup = findModel) {}

    translate(request: ChatCompletionRequest): RequestEnvelope {
        const model = this.lookup(request.model);
        if (!model) {
            throw new GatewayError(
                "UnknownModel",
                `Model '${request.model}' not found. Available models: ${getModelIds().join(", ")}`,
            );
        }

        const { temperature, top_p, max_tokens, presence_penalty, frequency_penalty, stop } = request;
        return {
            prompt: messagesToPrompt(request.messages),
            model,
            stream: request.stream,
            sampling: { temperature, top_p, max_tokens, presence_penalty, frequency_penalty, stop },
            tried: new Set(),
        };
    }
}

// ── Request validation ──────────────────────────────────────────────

function isRole(value: unknown): value is ChatRole {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(ROLE_LABELS, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function badRequest(message: string): GatewayError {
    return new GatewayError("BadRequest", message);
}

function readContent(value: unknown, index: number): string {
    if (typeof value === "string") return value;
    if (Array.isArray(value)) {
        return value
            .map((part, p) => {
                if (isRecord(part) && part.type === "text" && typeof part.text === "string") {
                    return part.text;
                }
                throw badRequest(`messages[${index}].content[${p}] must be a text part`);
            })
            .join("");
    }
    throw badRequest(`messages[${index}].content must be a string or an array of text parts`);
}

function readRange(
    body: Record<string, unknown>,
    key: keyof SamplingOptions,
    min: number,
    max: number,
): number | undefined {
    const value = body[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number" || Number.isNaN(value) || value < min || value > max) {
        throw badRequest(`${key} must be a number between ${min} and ${max}`);
    }
    return value;
}

/**
 * Validate an untrusted JSON body into a ChatCompletionRequest. Unknown
 * fields are ignored.
 */
export function parseChatRequest(body: unknown): ChatCompletionRequest {
    if (!isRecord(body)) throw badRequest("Request body must be a JSON object");

    if (typeof body.model !== "string" || body.model.trim() === "") {
        throw badRequest("model is required");
    }
    const model = body.model;
    if (!Array.isArray(body.messages) || body.messages.length === 0) {
        throw badRequest("messages must be a non-empty array");
    }

    const messages: ChatMessage[] = body.messages.map((raw: unknown, i: number) => {
        if (!isRecord(raw)) throw badRequest(`messages[${i}] must be an object`);
        const role = raw.role;
        if (!isRole(role)) {
            throw badRequest(`messages[${i}].role must be one of system, user, assistant`);
        }
        return { role, content: readContent(raw.content, i) };
    });

    if (body.stream !== undefined && body.stream !== null && typeof body.stream !== "boolean") {
        throw badRequest("stream must be a boolean");
    }

    let stop: string | string[] | undefined;
    if (body.stop !== undefined && body.stop !== null) {
        if (typeof body.stop === "string") {
            stop = body.stop;
        } else if (Array.isArray(body.stop) && body.stop.every((s: unknown) => typeof s === "string")) {
            stop = body.stop.map(String);
        } else {
            throw badRequest("stop must be a string or an array of strings");
        }
    }

    const maxTokens = body.max_tokens;
    if (maxTokens !== undefined && maxTokens !== null && (!Number.isInteger(maxTokens) || Number(maxTokens) < 1)) {
        throw badRequest("max_tokens must be a positive integer");
    }

    return {
        model,
        messages,
        stream: body.stream === true,
        temperature: readRange(body, "temperature", 0, 2),
        top_p: readRange(body, "top_p", 0, 1),
        max_tokens: typeof maxTokens === "number" ? maxTokens : undefined,
        presence_penalty: readRange(body, "presence_penalty", -2, 2),
        frequency_penalty: readRange(body, "frequency_penalty", -2, 2),
        stop,
    };
}
