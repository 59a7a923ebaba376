import type {
    CredentialSeed,
    CredentialSnapshot,
    PoolStatus,
    SecretPair,
    SelectionStrategy,
} from "../shared/types.js";
import { GatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import { pickLeastUsed, pickRandom, pickRoundRobin } from "./selector.js";

/** Consecutive failures after which a credential is taken out of rotation. */
export const MAX_CONSECUTIVE_ERRORS = 3;

export type CredentialRecord = {
    readonly id: string;
    readonly secrets: Readonly<SecretPair>;
    readonly displayName: string;
    isAvailable: boolean;
    errorCount: number;
    lastUsed: number;
};

/** What `select` hands out: identity and secrets, never the live record. */
export type CredentialLease = {
    id: string;
    displayName: string;
    secrets: Readonly<SecretPair>;
};

export type CredentialPoolOptions = {
    strategy?: SelectionStrategy;
    now?: () => number;
    random?: () => number;
};

/**
 * Owns every credential record and is the only thing that mutates them.
 *
 * All public methods are synchronous, so on the event loop each call is a
 * critical section: a select and a report can never interleave mid-update.
 */
export class CredentialPool {
    readonly strategy: SelectionStrategy;

    private readonly records: CredentialRecord[] = [];
    private readonly byId = new Map<string, CredentialRecord>();
    private readonly now: () => number;
    private readonly random: () => number;
    private nextId = 1;
    private cursor = 0;
    private lastStamp = 0;

    constructor(seeds: CredentialSeed[], options: CredentialPoolOptions = {}) {
        if (seeds.length === 0) {
            throw new GatewayError(
                "ConfigError",
                "No credentials configured. Set POOLGATE_CREDENTIALS_JSON, CREDENTIAL_<n>_PRIMARY or SECRET_PRIMARY.",
            );
        }
        this.strategy = options.strategy ?? "round_robin";
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
        for (const seed of seeds) {
            this.register(seed.secrets, seed.displayName);
        }
    }

    get size(): number {
        return this.records.length;
    }

    register(secrets: SecretPair, displayName?: string): string {
        const duplicate = this.records.find(
            (r) => r.secrets.primary === secrets.primary && r.secrets.secondary === secrets.secondary,
        );
        if (duplicate) {
            throw new GatewayError(
                "DuplicateCredential",
                `Secret pair already registered as ${duplicate.id}`,
                { context: { existingId: duplicate.id } },
            );
        }

        const id = `cred-${this.nextId++}`;
        const record: CredentialRecord = {
            id,
            secrets: Object.freeze({ primary: secrets.primary, secondary: secrets.secondary }),
            displayName: displayName?.trim() || id,
            isAvailable: true,
            errorCount: 0,
            lastUsed: 0,
        };
        this.records.push(record);
        this.byId.set(id, record);
        logger.debug(`Registered credential ${id} (${record.displayName})`);
        return id;
    }

    /**
     * Pick one eligible credential (available and not excluded) according to
     * the pool strategy and stamp its `lastUsed`.
     */
    select(exclude: ReadonlySet<string> = new Set()): CredentialLease {
        const eligible = (r: CredentialRecord) => r.isAvailable && !exclude.has(r.id);

        let picked: CredentialRecord | undefined;
        switch (this.strategy) {
            case "round_robin": {
                const hit = pickRoundRobin(this.records, this.cursor, eligible);
                if (hit) {
                    picked = hit.record;
                    this.cursor = hit.nextCursor;
                }
                break;
            }
            case "random":
                picked = pickRandom(this.records.filter(eligible), this.random);
                break;
            case "least_used":
                picked = pickLeastUsed(this.records.filter(eligible));
                break;
        }

        if (!picked) {
            throw new GatewayError(
                "Exhausted",
                `No eligible credential (${this.availableCount()} of ${this.records.length} available, ${exclude.size} excluded)`,
            );
        }

        picked.lastUsed = this.stamp();
        return { id: picked.id, displayName: picked.displayName, secrets: picked.secrets };
    }

    reportSuccess(id: string): void {
        const record = this.byId.get(id);
        if (!record) return;
        if (!record.isAvailable) {
            logger.pool(`${record.displayName} (${id}) recovered`);
        }
        record.errorCount = 0;
        record.isAvailable = true;
    }

    reportFailure(id: string): void {
        const record = this.byId.get(id);
        if (!record) return;
        record.errorCount++;
        if (record.errorCount >= MAX_CONSECUTIVE_ERRORS && record.isAvailable) {
            record.isAvailable = false;
            logger.warn(
                `${record.displayName} (${id}) disabled after ${record.errorCount} consecutive failures`,
            );
        }
    }

    /**
     * Operator override: clear failures on one credential, or on all of them
     * when no id is given. Returns false for an unknown id.
     */
    reset(id?: string): boolean {
        const targets = id === undefined ? this.records : [this.byId.get(id)];
        let touched = false;
        for (const record of targets) {
            if (!record) continue;
            record.errorCount = 0;
            record.isAvailable = true;
            touched = true;
        }
        if (touched) logger.pool(`Reset ${id ?? "all credentials"}`);
        return touched;
    }

    status(): PoolStatus {
        const credentials: CredentialSnapshot[] = this.records.map((r) => ({
            id: r.id,
            displayName: r.displayName,
            isAvailable: r.isAvailable,
            errorCount: r.errorCount,
            lastUsed: r.lastUsed,
        }));
        return {
            strategy: this.strategy,
            totalCredentials: credentials.length,
            availableCredentials: credentials.filter((c) => c.isAvailable).length,
            credentials,
        };
    }

    private availableCount(): number {
        return this.records.filter((r) => r.isAvailable).length;
    }

    // Strictly increasing so least_used never sees two selections tie.
    private stamp(): number {
        const t = Math.max(this.now(), this.lastStamp + 1);
        this.lastStamp = t;
        return t;
    }
}
