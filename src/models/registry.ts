/**
 * Model registry: maps client-facing aliases to upstream model identifiers.
 */

export type ModelTier = "standard" | "advanced";

export type ModelInfo = {
    id: string;
    upstreamId: string;
    name: string;
    tier: ModelTier;
    deprecated: boolean;
    ownedBy: string;
};

const MODELS: ModelInfo[] = [
    {
        id: "gemini-2.5-pro",
        upstreamId: "gemini-2.5-pro",
        name: "Gemini 2.5 Pro",
        tier: "standard",
        deprecated: false,
        ownedBy: "google",
    },
    {
        id: "gemini-2.5-flash",
        upstreamId: "gemini-2.5-flash",
        name: "Gemini 2.5 Flash",
        tier: "standard",
        deprecated: false,
        ownedBy: "google",
    },
    {
        id: "gemini-2.0-flash",
        upstreamId: "gemini-2.0-flash",
        name: "Gemini 2.0 Flash",
        tier: "standard",
        deprecated: true,
        ownedBy: "google",
    },
    {
        id: "gemini-2.0-flash-thinking",
        upstreamId: "gemini-2.0-flash-thinking",
        name: "Gemini 2.0 Flash Thinking",
        tier: "standard",
        deprecated: true,
        ownedBy: "google",
    },
    {
        id: "gemini-2.5-exp-advanced",
        upstreamId: "gemini-2.5-exp-advanced",
        name: "Gemini 2.5 Experimental (Advanced)",
        tier: "advanced",
        deprecated: false,
        ownedBy: "google",
    },
    {
        id: "gemini-2.0-exp-advanced",
        upstreamId: "gemini-2.0-exp-advanced",
        name: "Gemini 2.0 Experimental (Advanced)",
        tier: "advanced",
        deprecated: true,
        ownedBy: "google",
    },
];

const modelMap = new Map<string, ModelInfo>();
for (const m of MODELS) {
    modelMap.set(m.id, m);
}

export function findModel(alias: string): ModelInfo | undefined {
    return modelMap.get(alias);
}

export function getAllModels(): ModelInfo[] {
    return [...MODELS];
}

export function getModelIds(): string[] {
    return MODELS.map((m) => m.id);
}
