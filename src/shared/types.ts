// ── Credential types ────────────────────────────────────────────────

export type SecretPair = {
    primary: string;
    secondary: string;
};

export type CredentialSeed = {
    secrets: SecretPair;
    displayName?: string;
};

export type SelectionStrategy = "round_robin" | "random" | "least_used";

export const SELECTION_STRATEGIES: readonly SelectionStrategy[] = [
    "round_robin",
    "random",
    "least_used",
];

export type CredentialSnapshot = {
    id: string;
    displayName: string;
    isAvailable: boolean;
    errorCount: number;
    lastUsed: number;
};

export type PoolStatus = {
    strategy: SelectionStrategy;
    totalCredentials: number;
    availableCredentials: number;
    credentials: CredentialSnapshot[];
};

// ── Chat completion types ───────────────────────────────────────────

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
    role: ChatRole;
    content: string;
};

export type SamplingOptions = {
    temperature?: number;
    top_p?: number;
    max_tokens?: number;
    presence_penalty?: number;
    frequency_penalty?: number;
    stop?: string | string[];
};

export type ChatCompletionRequest = SamplingOptions & {
    model: string;
    messages: ChatMessage[];
    stream: boolean;
};

export type FinishReason = "stop" | "error";

export type Usage = {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
};

export type ChatCompletionResponse = {
    id: string;
    object: "chat.completion";
    created: number;
    model: string;
    choices: Array<{
        index: number;
        message: { role: "assistant"; content: string };
        finish_reason: FinishReason;
    }>;
    usage: Usage;
};

export type ChatCompletionChunk = {
    id: string;
    object: "chat.completion.chunk";
    created: number;
    model: string;
    choices: Array<{
        index: number;
        delta: { role?: "assistant"; content?: string };
        finish_reason: FinishReason | null;
    }>;
    usage?: Usage;
    error?: { type: string; message: string };
};

// ── Stats ───────────────────────────────────────────────────────────

export type RequestStats = {
    timestamp: number;
    model: string;
    upstreamModel?: string;
    credentialId: string;
    attempts: number;
    stream: boolean;
    latencyMs: number;
    promptTokens: number;
    completionTokens: number;
    success: boolean;
    error?: string;
};
