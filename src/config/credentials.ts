import type { CredentialSeed } from "../shared/types.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

export type Env = Record<string, string | undefined>;

/** Number of CREDENTIAL_<n>_* slots scanned. */
export const INDEXED_SLOTS = 10;

export type CredentialSource = {
    name: string;
    /** Seeds when the source is present and structurally valid, otherwise null. */
    read(env: Env): CredentialSeed[] | null;
};

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

// ── Sources ─────────────────────────────────────────────────────────

export const jsonSource: CredentialSource = {
    name: "POOLGATE_CREDENTIALS_JSON",
    read(env) {
        const raw = nonEmpty(env.POOLGATE_CREDENTIALS_JSON);
        if (!raw) return null;

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (err) {
            logger.warn(`Ignoring POOLGATE_CREDENTIALS_JSON: ${errorMessage(err)}`);
            return null;
        }
        if (!Array.isArray(parsed)) {
            logger.warn("Ignoring POOLGATE_CREDENTIALS_JSON: expected an array");
            return null;
        }

        const seeds: CredentialSeed[] = [];
        parsed.forEach((entry: unknown, i: number) => {
            if (typeof entry !== "object" || entry === null) {
                logger.warn(`Skipping POOLGATE_CREDENTIALS_JSON[${i}]: not an object`);
                return;
            }
            const primary = "secret_primary" in entry && typeof entry.secret_primary === "string"
                ? nonEmpty(entry.secret_primary)
                : undefined;
            if (!primary) {
                logger.warn(`Skipping POOLGATE_CREDENTIALS_JSON[${i}]: secret_primary is required`);
                return;
            }
            const secondary = "secret_secondary" in entry && typeof entry.secret_secondary === "string"
                ? entry.secret_secondary.trim()
                : "";
            const name = "name" in entry && typeof entry.name === "string" ? nonEmpty(entry.name) : undefined;
            seeds.push({ secrets: { primary, secondary }, displayName: name ?? `Account-${i + 1}` });
        });
        return seeds.length > 0 ? seeds : null;
    },
};

export const indexedSource: CredentialSource = {
    name: "CREDENTIAL_<n>_*",
    read(env) {
        const seeds: CredentialSeed[] = [];
        for (let i = 1; i <= INDEXED_SLOTS; i++) {
            const primary = nonEmpty(env[`CREDENTIAL_${i}_PRIMARY`]);
            if (!primary) continue;
            seeds.push({
                secrets: { primary, secondary: env[`CREDENTIAL_${i}_SECONDARY`]?.trim() ?? "" },
                displayName: nonEmpty(env[`CREDENTIAL_${i}_NAME`]) ?? `Account-${i}`,
            });
        }
        return seeds.length > 0 ? seeds : null;
    },
};

export const legacySource: CredentialSource = {
    name: "SECRET_PRIMARY",
    read(env) {
        const primary = nonEmpty(env.SECRET_PRIMARY);
        if (!primary) return null;
        return [
            {
                secrets: { primary, secondary: env.SECRET_SECONDARY?.trim() ?? "" },
                displayName: "Primary Account",
            },
        ];
    },
};

/** Most structured first; the first source that yields seeds wins whole. */
export const CREDENTIAL_SOURCES: readonly CredentialSource[] = [jsonSource, indexedSource, legacySource];

function dedupe(seeds: CredentialSeed[], source: string): CredentialSeed[] {
    const seen = new Set<string>();
    return seeds.filter((seed) => {
        const key = JSON.stringify([seed.secrets.primary, seed.secrets.secondary]);
        if (seen.has(key)) {
            logger.warn(`Dropping duplicate credential "${seed.displayName ?? "unnamed"}" from ${source}`);
            return false;
        }
        seen.add(key);
        return true;
    });
}

export type ResolvedCredentials = {
    source: string | null;
    seeds: CredentialSeed[];
};

export function resolveCredentials(
    env: Env,
    sources: readonly CredentialSource[] = CREDENTIAL_SOURCES,
): ResolvedCredentials {
    for (const source of sources) {
        const seeds = source.read(env);
        if (seeds) {
            return { source: source.name, seeds: dedupe(seeds, source.name) };
        }
    }
    return { source: null, seeds: [] };
}
