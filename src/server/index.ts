import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { isGatewayError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

import {
    handleChatCompletion,
    handleHealth,
    handleModels,
    handlePoolReset,
    handlePoolStatus,
    handleRoot,
    handleStats,
    type GatewayContext,
} from "./handlers.js";
import { sendError, sendJson } from "./helpers.js";

type Handler = (ctx: GatewayContext, req: IncomingMessage, res: ServerResponse) => Promise<void>;

const ROUTES: Record<string, Handler> = {
    "POST /v1/chat/completions": handleChatCompletion,
    "GET /v1/models": handleModels,
    "GET /pool/status": handlePoolStatus,
    "POST /pool/reset": handlePoolReset,
    "GET /api/stats": handleStats,
    "GET /health": handleHealth,
    "GET /": handleRoot,
};

export function createGatewayServer(ctx: GatewayContext): Server {
    return createServer(async (req, res) => {
        const url = new URL(req.url ?? "/", "http://localhost");

        // CORS
        res.setHeader("Access-Control-Allow-Origin", "*");
        res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");

        if (req.method === "OPTIONS") {
            res.writeHead(204);
            res.end();
            return;
        }

        const handler = ROUTES[`${req.method} ${url.pathname}`];
        if (!handler) {
            sendJson(res, 404, {
                error: { type: "NotFound", code: "not_found", message: `No route for ${req.method} ${url.pathname}` },
            });
            return;
        }

        try {
            await handler(ctx, req, res);
        } catch (err) {
            if (isGatewayError(err)) {
                sendError(res, err);
                return;
            }
            logger.error("Request error:", err instanceof Error ? err.message : err);
            if (!res.headersSent) {
                sendJson(res, 500, { error: { type: "InternalError", code: "internal_error", message: "Internal error" } });
            } else if (!res.writableEnded) {
                res.end();
            }
        }
    });
}

export function startServer(ctx: GatewayContext, port: number, host = "0.0.0.0"): Promise<Server> {
    const server = createGatewayServer(ctx);
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
            server.off("error", reject);
            const status = ctx.pool.status();
            logger.ok(`poolgate listening on http://${host}:${port}`);
            logger.info(
                `Credentials: ${status.availableCredentials}/${status.totalCredentials} available (strategy ${status.strategy})`,
            );
            logger.info(`Endpoints:`);
            logger.info(`  POST /v1/chat/completions  OpenAI-compatible`);
            logger.info(`  GET  /v1/models            Model table`);
            logger.info(`  GET  /pool/status          Credential pool state`);
            logger.info(`  POST /pool/reset           Re-enable credentials`);
            logger.info(`  GET  /api/stats            Request log`);
            logger.info(`  GET  /health               Health check`);
            resolve(server);
        });
    });
}
