import type { CredentialRecord } from "./credential-pool.js";

type Eligible = (record: CredentialRecord) => boolean;

/**
 * Walk the full registration order from `cursor`, wrapping once, and return
 * the first eligible record plus the cursor position just after it.
 */
export function pickRoundRobin(
    records: readonly CredentialRecord[],
    cursor: number,
    eligible: Eligible,
): { record: CredentialRecord; nextCursor: number } | undefined {
    const n = records.length;
    for (let step = 0; step < n; step++) {
        const index = (cursor + step) % n;
        const record = records[index];
        if (record && eligible(record)) {
            return { record, nextCursor: (index + 1) % n };
        }
    }
    return undefined;
}

export function pickRandom(
    candidates: readonly CredentialRecord[],
    random: () => number,
): CredentialRecord | undefined {
    if (candidates.length === 0) return undefined;
    const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
    return candidates[index];
}

/**
 * Oldest `lastUsed` first (never-used is 0), then fewest errors. The sort is
 * stable, so remaining ties keep registration order.
 */
export function pickLeastUsed(candidates: readonly CredentialRecord[]): CredentialRecord | undefined {
    return [...candidates].sort(
        (a, b) => a.lastUsed - b.lastUsed || a.errorCount - b.errorCount,
    )[0];
}
