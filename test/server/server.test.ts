import { afterEach, describe, expect, it } from "vitest";
import type { Server } from "node:http";
import { createGatewayContext } from "../../src/gateway/index.js";
import { createGatewayServer } from "../../src/server/index.js";
import type { GatewayContext } from "../../src/server/handlers.js";
import type { GatewayConfig } from "../../src/config/index.js";
import { openDatabase } from "../../src/storage/db.js";
import { RequestLog } from "../../src/storage/request-log.js";
import { GatewayError } from "../../src/shared/errors.js";
import { FakeSession, failWith, replyWith, seeds, type Script } from "../helpers/fake-session.js";

const CONFIG: GatewayConfig = {
    port: 0,
    host: "127.0.0.1",
    strategy: "round_robin",
    sendTimeoutMs: 1_000,
    upstreamUrl: "http://upstream.test/generate",
    dbPath: ":memory:",
    logLevel: "silent",
    credentialSource: "test",
    credentials: seeds("A", "B"),
};

let server: Server | undefined;

afterEach(async () => {
    const current = server;
    server = undefined;
    if (!current) return;
    current.closeAllConnections();
    await new Promise<void>((resolve, reject) => current.close((err) => (err ? reject(err) : resolve())));
});

async function start(fallback: Script, byName: Record<string, Script> = {}) {
    const session = new FakeSession(fallback, byName);
    const ctx: GatewayContext = createGatewayContext(CONFIG, {
        adapter: session,
        requestLog: new RequestLog(openDatabase(":memory:")),
    });
    const listening = createGatewayServer(ctx);
    server = listening;
    await new Promise<void>((resolve) => listening.listen(0, "127.0.0.1", resolve));
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
    const base = `http://127.0.0.1:${address.port}`;
    return { ctx, session, base };
}

function chat(base: string, body: unknown): Promise<Response> {
    return fetch(`${base}/v1/chat/completions`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: typeof body === "string" ? body : JSON.stringify(body),
    });
}

async function json(res: Response) {
    return JSON.parse(await res.text());
}

const HI = [{ role: "user", content: "Hi" }];

type Frame = { id: string | undefined; data: string };

function frames(text: string): Frame[] {
    return text
        .split("\n\n")
        .filter((block) => block.trim() !== "")
        .map((block) => {
            const lines = block.split("\n");
            const id = lines.find((l) => l.startsWith("id: "))?.slice(4);
            const data = lines.find((l) => l.startsWith("data: "))?.slice(6) ?? "";
            return { id, data };
        });
}

describe("gateway server", () => {
    it("serves a non-streaming completion", async () => {
        const { base } = await start(replyWith("Hello", " world"));

        const res = await chat(base, { model: "gemini-2.5-pro", messages: HI });
        const body = await json(res);

        expect(res.status).toBe(200);
        expect(res.headers.get("x-poolgate-credential")).toBe("cred-1");
        expect(res.headers.get("x-poolgate-attempts")).toBe("1");
        expect(body).toMatchObject({
            object: "chat.completion",
            model: "gemini-2.5-pro",
            choices: [{ index: 0, message: { role: "assistant", content: "Hello world" }, finish_reason: "stop" }],
            usage: { prompt_tokens: 2, completion_tokens: 2, total_tokens: 4 },
        });
        expect(body.id).toMatch(/^chatcmpl-[0-9a-f]{32}$/);
    });

    it("streams SSE frames ending with [DONE]", async () => {
        const { base } = await start(replyWith("Hel", "lo"));

        const res = await chat(base, { model: "gemini-2.5-flash", messages: HI, stream: true });
        const list = frames(await res.text());

        expect(res.headers.get("content-type")).toBe("text/event-stream");
        expect(list.map((f) => f.id)).toEqual(["0", "1", "2", undefined]);
        expect(list[3]?.data).toBe("[DONE]");

        const chunks = list.slice(0, 3).map((f) => JSON.parse(f.data));
        expect(chunks.map((c) => c.choices[0].delta.content ?? "").join("")).toBe("Hello");
        expect(chunks[0].choices[0].delta.role).toBe("assistant");
        expect(chunks[2].choices[0].finish_reason).toBe("stop");
        expect(chunks[2].usage).toEqual({ prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 });
    });

    it("ends a stream with an error frame on a mid-stream failure", async () => {
        const { base, ctx } = await start(failWith(new GatewayError("NetworkError", "connection reset"), "partial"));

        const res = await chat(base, { model: "gemini-2.5-pro", messages: HI, stream: true });
        const list = frames(await res.text());

        expect(res.status).toBe(200);
        expect(list).toHaveLength(3);
        const terminal = JSON.parse(list[1]?.data ?? "");
        expect(terminal.choices[0].finish_reason).toBe("error");
        expect(terminal.error).toEqual({ type: "NetworkError", message: "connection reset" });
        expect(list[2]?.data).toBe("[DONE]");
        expect(ctx.pool.status().credentials[0]?.errorCount).toBe(1);
    });

    it("retries on another credential before answering", async () => {
        const { base, session } = await start(replyWith("ok"), {
            A: failWith(new GatewayError("AuthExpired", "cookie expired")),
        });

        const res = await chat(base, { model: "gemini-2.5-pro", messages: HI });

        expect(res.status).toBe(200);
        expect(res.headers.get("x-poolgate-credential")).toBe("cred-2");
        expect(res.headers.get("x-poolgate-attempts")).toBe("2");
        expect(session.credentialsUsed).toEqual(["cred-1", "cred-2"]);
    });

    it("returns 502 RetriesExhausted when every attempt fails", async () => {
        const { base } = await start(failWith(new GatewayError("AuthExpired", "cookie expired")));

        const res = await chat(base, { model: "gemini-2.5-pro", messages: HI });

        expect(res.status).toBe(502);
        expect(await json(res)).toMatchObject({ error: { type: "RetriesExhausted", code: "retries_exhausted" } });
    });

    it("returns 503 with Retry-After when no credential is available", async () => {
        const { base, ctx, session } = await start(replyWith("ok"));
        for (const id of ["cred-1", "cred-2"]) {
            for (let i = 0; i < 3; i++) ctx.pool.reportFailure(id);
        }

        const res = await chat(base, { model: "gemini-2.5-pro", messages: HI });

        expect(res.status).toBe(503);
        expect(res.headers.get("retry-after")).toBe("5");
        expect(await json(res)).toMatchObject({ error: { type: "AllCredentialsExhausted" } });
        expect(session.calls).toHaveLength(0);

        const health = await fetch(`${base}/health`);
        expect(health.status).toBe(503);
    });

    it("rejects an unknown model without touching the pool", async () => {
        const { base, session } = await start(replyWith("ok"));

        const res = await chat(base, { model: "gpt-4", messages: HI });

        expect(res.status).toBe(404);
        expect(await json(res)).toMatchObject({ error: { type: "UnknownModel", code: "model_not_found" } });
        expect(session.calls).toHaveLength(0);

        const status = await json(await fetch(`${base}/pool/status`));
        expect(status.credentials.map((c: { last_used: string | null }) => c.last_used)).toEqual([null, null]);
    });

    it("rejects malformed JSON with 400", async () => {
        const { base } = await start(replyWith("ok"));

        const res = await chat(base, "{not json");

        expect(res.status).toBe(400);
        expect(await json(res)).toEqual({
            error: { type: "BadRequest", code: "invalid_request", message: "Request body is not valid JSON" },
        });
    });

    it("lists models", async () => {
        const { base } = await start(replyWith("ok"));

        const body = await json(await fetch(`${base}/v1/models`));

        expect(body.object).toBe("list");
        expect(body.data).toHaveLength(6);
        expect(body.data[0]).toEqual({
            id: "gemini-2.5-pro",
            object: "model",
            created: 0,
            owned_by: "google",
            name: "Gemini 2.5 Pro",
            tier: "standard",
            deprecated: false,
        });
    });

    it("reports and resets pool state", async () => {
        const { base, ctx } = await start(replyWith("ok"));
        for (let i = 0; i < 3; i++) ctx.pool.reportFailure("cred-1");

        const status = await json(await fetch(`${base}/pool/status`));
        expect(status).toMatchObject({
            strategy: "round_robin",
            total_credentials: 2,
            available_credentials: 1,
        });
        expect(status.credentials[0]).toEqual({
            id: "cred-1",
            display_name: "A",
            is_available: false,
            error_count: 3,
            last_used: null,
        });

        const missing = await fetch(`${base}/pool/reset`, { method: "POST", body: JSON.stringify({ id: "cred-9" }) });
        expect(missing.status).toBe(404);

        const reset = await fetch(`${base}/pool/reset`, { method: "POST", body: JSON.stringify({ id: "cred-1" }) });
        expect(reset.status).toBe(200);
        expect((await json(reset)).available_credentials).toBe(2);
    });

    it("records requests for /api/stats", async () => {
        const { base } = await start(replyWith("Hello world"));
        await chat(base, { model: "gemini-2.5-pro", messages: HI });
        await chat(base, { model: "gpt-4", messages: HI });

        const stats = await json(await fetch(`${base}/api/stats`));

        expect(stats.summary).toMatchObject({
            totalRequests: 2,
            successRate: 0.5,
            credentialBreakdown: { "cred-1": 1, none: 1 },
        });
        expect(stats.requests[0]).toMatchObject({ model: "gpt-4", success: false, error: "UnknownModel" });
    });

    it("answers CORS preflight and unknown routes", async () => {
        const { base } = await start(replyWith("ok"));

        const preflight = await fetch(`${base}/v1/chat/completions`, { method: "OPTIONS" });
        expect(preflight.status).toBe(204);
        expect(preflight.headers.get("access-control-allow-origin")).toBe("*");

        const missing = await fetch(`${base}/nope`);
        expect(missing.status).toBe(404);
        expect(await json(missing)).toMatchObject({ error: { code: "not_found" } });
    });

    it("reports health", async () => {
        const { base } = await start(replyWith("ok"));

        const res = await fetch(`${base}/health`);

        expect(res.status).toBe(200);
        expect(await json(res)).toEqual({ status: "ok", available_credentials: 2, total_credentials: 2 });
    });
});
