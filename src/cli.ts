#!/usr/bin/env node
import "dotenv/config";
import { logger, setLogLevel } from "./shared/logger.js";
import { errorMessage, isGatewayError } from "./shared/errors.js";
import { loadConfig, parsePort, DEFAULT_DB_PATH } from "./config/index.js";
import { createGatewayContext } from "./gateway/index.js";
import { startServer } from "./server/index.js";
import { getAllModels } from "./models/registry.js";
import { openDatabase } from "./storage/db.js";
import { RequestLog } from "./storage/request-log.js";

// ── CLI arg parsing ─────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0];

function getFlag(flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx >= 0 ? args[idx + 1] : undefined;
}

// ── Commands ────────────────────────────────────────────────────────

async function cmdStart() {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const port = parsePort(getFlag("--port"), "--port") ?? config.port;

    const ctx = createGatewayContext(config);
    logger.info(`Loaded ${config.credentials.length} credential(s) from ${config.credentialSource}`);
    for (const c of ctx.pool.status().credentials) {
        logger.info(`  - ${c.displayName} (${c.id})`);
    }
    const server = await startServer(ctx, port, config.host);

    const shutdown = () => {
        logger.info("Shutting down...");
        server.close(() => process.exit(0));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
}

function cmdAccounts() {
    const config = loadConfig();
    console.log(`\n\x1b[36m━━ Credentials (${config.credentialSource}) ━━\x1b[0m\n`);
    config.credentials.forEach((seed, i) => {
        const prefix = seed.secrets.primary.slice(0, 8);
        const secondary = seed.secrets.secondary ? "with secondary" : "primary only";
        console.log(`  ${String(i + 1).padStart(2)}. \x1b[33m${(seed.displayName ?? "").padEnd(24)}\x1b[0m ${prefix}... (${secondary})`);
    });
    console.log(`\n  Strategy: ${config.strategy}\n`);
}

function cmdModels() {
    console.log("\n\x1b[36m━━ Models ━━\x1b[0m\n");
    for (const m of getAllModels()) {
        const flags = [m.tier, m.deprecated ? "deprecated" : ""].filter(Boolean).join(", ");
        console.log(`  \x1b[33m${m.id.padEnd(28)}\x1b[0m ${m.name} \x1b[90m(${flags})\x1b[0m`);
    }
    console.log();
}

function cmdStats() {
    const path = process.env.POOLGATE_DB_PATH?.trim() || DEFAULT_DB_PATH;
    const summary = new RequestLog(openDatabase(path)).summary();
    console.log("\n\x1b[36m━━ Request stats ━━\x1b[0m\n");
    console.log(`  Requests:     ${summary.totalRequests}`);
    console.log(`  Tokens:       ${summary.totalTokens}`);
    console.log(`  Success rate: ${(summary.successRate * 100).toFixed(1)}%`);
    console.log(`  Avg latency:  ${summary.avgLatencyMs}ms`);
    for (const [id, count] of Object.entries(summary.credentialBreakdown)) {
        console.log(`    ${id.padEnd(12)} ${count}`);
    }
    console.log();
}

function printHelp() {
    console.log(`
\x1b[36mpoolgate\x1b[0m: OpenAI-compatible gateway over a pool of upstream credentials

\x1b[33mUsage:\x1b[0m
  poolgate start [--port <port>]   Start the gateway
  poolgate accounts                List configured credentials
  poolgate models                  List model aliases
  poolgate stats                   Show request log summary
`);
}

async function main() {
    switch (command) {
        case "start":
            await cmdStart();
            break;
        case "accounts":
            cmdAccounts();
            break;
        case "models":
            cmdModels();
            break;
        case "stats":
            cmdStats();
            break;
        default:
            printHelp();
    }
}

main().catch((err: unknown) => {
    if (isGatewayError(err)) {
        logger.error(`${err.kind}: ${err.message}`);
    } else {
        logger.error(errorMessage(err));
    }
    process.exit(1);
});
