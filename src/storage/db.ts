import Database, { type Database as DatabaseType } from "better-sqlite3";
import { dirname } from "node:path";
import { mkdirSync, existsSync } from "node:fs";

export type { DatabaseType };

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS requests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        model TEXT NOT NULL,
        upstream_model TEXT,
        credential_id TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        stream INTEGER NOT NULL, -- 0 or 1
        latency_ms INTEGER,
        prompt_tokens INTEGER,
        completion_tokens INTEGER,
        success INTEGER NOT NULL, -- 0 or 1
        error_msg TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_timestamp ON requests(timestamp);
    CREATE INDEX IF NOT EXISTS idx_credential ON requests(credential_id);
`;

/**
 * Open (creating if needed) the request database. ":memory:" gives a
 * throwaway database.
 */
export function openDatabase(path: string): DatabaseType {
    if (path !== ":memory:") {
        const dir = dirname(path);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
    }

    const db = new Database(path);
    if (path !== ":memory:") {
        // WAL keeps readers of /api/stats off the writer's back
        db.pragma("journal_mode = WAL");
    }
    db.exec(SCHEMA);
    return db;
}
