import { describe, expect, it } from "vitest";
import { CredentialPool } from "../../src/pool/credential-pool.js";
import { Dispatcher, type DispatchOutcome, type DispatchState, type DispatcherOptions } from "../../src/gateway/dispatcher.js";
import { RequestTranslator, type RequestEnvelope } from "../../src/gateway/translator.js";
import { GatewayError } from "../../src/shared/errors.js";
import { FakeSession, drain, failWith, hangUntilAbort, replyWith, seeds } from "../helpers/fake-session.js";

function envelope(stream = false): RequestEnvelope {
    return new RequestTranslator().translate({
        model: "gemini-2.5-pro",
        messages: [{ role: "user", content: "Hi" }],
        stream,
    });
}

function succeeded(outcome: DispatchOutcome) {
    if (outcome.status !== "succeeded") {
        throw new Error(`expected success, got ${outcome.error.kind}: ${outcome.error.message}`);
    }
    return outcome;
}

function failed(outcome: DispatchOutcome) {
    if (outcome.status !== "failed") {
        throw new Error(`expected failure, got success on ${outcome.credentialId}`);
    }
    return outcome;
}

function setup(names: string[], session: FakeSession, options: DispatcherOptions = {}) {
    const pool = new CredentialPool(seeds(...names));
    const transitions: DispatchState[] = [];
    const dispatcher = new Dispatcher(pool, session, {
        ...options,
        onTransition: (state) => transitions.push(state),
    });
    const errorCounts = () => pool.status().credentials.map((c) => c.errorCount);
    return { pool, dispatcher, transitions, errorCounts };
}

describe("Dispatcher", () => {
    it("returns the first credential's reply and reports success", async () => {
        const session = new FakeSession(replyWith("Hello", " world"));
        const { pool, dispatcher, transitions } = setup(["A", "B"], session);
        pool.reportFailure("cred-1");

        const outcome = succeeded(await dispatcher.dispatch(envelope()));

        expect(outcome).toMatchObject({ credentialId: "cred-1", displayName: "A", attempts: 1 });
        expect(await drain(outcome.deltas)).toEqual(["Hello", " world"]);
        expect(pool.status().credentials[0]?.errorCount).toBe(0);
        expect(transitions.map((t) => t.name)).toEqual(["selecting", "sending", "succeeded"]);
    });

    it("passes the resolved upstream model and the prompt to the adapter", async () => {
        const session = new FakeSession(replyWith("ok"));
        const { dispatcher } = setup(["A"], session);

        await dispatcher.dispatch(envelope());

        expect(session.calls[0]).toMatchObject({
            model: "gemini-2.5-pro",
            prompt: "User: Hi",
            stream: false,
            credential: { id: "cred-1", secrets: { primary: "test-secret-A" } },
        });
    });

    it("rotates to another credential after a retryable failure", async () => {
        const session = new FakeSession(replyWith("ok"), {
            A: failWith(new GatewayError("RateLimited", "slow down")),
        });
        const { dispatcher, transitions, errorCounts } = setup(["A", "B"], session);
        const env = envelope();

        const outcome = succeeded(await dispatcher.dispatch(env));

        expect(outcome).toMatchObject({ credentialId: "cred-2", attempts: 2 });
        expect([...env.tried]).toEqual(["cred-1"]);
        expect(errorCounts()).toEqual([1, 0]);
        expect(transitions.map((t) => t.name)).toEqual([
            "selecting",
            "sending",
            "retrying",
            "selecting",
            "sending",
            "succeeded",
        ]);
    });

    it("treats a plain adapter exception as a transient upstream error", async () => {
        const session = new FakeSession(replyWith("ok"), { A: failWith(new Error("socket hang up")) });
        const { dispatcher, transitions } = setup(["A", "B"], session);

        const outcome = succeeded(await dispatcher.dispatch(envelope()));

        expect(outcome.credentialId).toBe("cred-2");
        const retry = transitions.find((t) => t.name === "retrying");
        expect(retry).toMatchObject({ error: { kind: "UpstreamError", message: "socket hang up" } });
    });

    it("stops on a fatal error without touching the credential", async () => {
        const session = new FakeSession(failWith(new GatewayError("BadRequest", "bad prompt")));
        const { dispatcher, errorCounts } = setup(["A", "B"], session);
        const env = envelope();

        const outcome = failed(await dispatcher.dispatch(env));

        expect(outcome.attempts).toBe(1);
        expect(outcome.error.kind).toBe("BadRequest");
        expect(env.tried.size).toBe(0);
        expect(errorCounts()).toEqual([0, 0]);
        expect(session.calls).toHaveLength(1);
    });

    it("does not retry a non-transient upstream error", async () => {
        const session = new FakeSession(
            failWith(new GatewayError("UpstreamError", "teapot", { transient: false })),
        );
        const { dispatcher, errorCounts } = setup(["A", "B"], session);

        const outcome = failed(await dispatcher.dispatch(envelope()));

        expect(outcome.error.kind).toBe("UpstreamError");
        expect(errorCounts()).toEqual([0, 0]);
    });

    it("gives up with RetriesExhausted once the attempt bound is reached", async () => {
        const session = new FakeSession(failWith(new GatewayError("AuthExpired", "cookie expired")));
        const { dispatcher, errorCounts } = setup(["A", "B", "C"], session, { maxAttempts: 2 });

        const outcome = failed(await dispatcher.dispatch(envelope()));

        expect(outcome.attempts).toBe(2);
        expect(outcome.error.kind).toBe("RetriesExhausted");
        expect(outcome.error.cause).toMatchObject({ kind: "AuthExpired" });
        expect(session.credentialsUsed).toEqual(["cred-1", "cred-2"]);
        expect(errorCounts()).toEqual([1, 1, 0]);
    });

    it("bounds attempts by the pool size by default", async () => {
        const session = new FakeSession(failWith(new GatewayError("NetworkError", "refused")));
        const { dispatcher } = setup(["A", "B"], session);

        const outcome = failed(await dispatcher.dispatch(envelope()));

        expect(outcome.attempts).toBe(2);
        expect(outcome.error.kind).toBe("RetriesExhausted");
    });

    it("reports AllCredentialsExhausted when the pool runs out before the bound", async () => {
        const session = new FakeSession(failWith(new GatewayError("NetworkError", "refused")));
        const { dispatcher } = setup(["A", "B"], session, { maxAttempts: 5 });

        const outcome = failed(await dispatcher.dispatch(envelope()));

        expect(outcome.attempts).toBe(2);
        expect(outcome.error.kind).toBe("AllCredentialsExhausted");
        expect(outcome.error.message).toContain("Last error: refused");
    });

    it("never calls the adapter when every credential is disabled", async () => {
        const session = new FakeSession(replyWith("ok"));
        const { pool, dispatcher } = setup(["A"], session);
        for (let i = 0; i < 3; i++) pool.reportFailure("cred-1");

        const outcome = failed(await dispatcher.dispatch(envelope()));

        expect(outcome.attempts).toBe(0);
        expect(outcome.error.kind).toBe("AllCredentialsExhausted");
        expect(session.calls).toHaveLength(0);
    });

    it("aborts a slow attempt with Timeout and moves on", async () => {
        const session = new FakeSession(replyWith("late but fine"), { A: hangUntilAbort() });
        const { dispatcher, transitions, errorCounts } = setup(["A", "B"], session, { sendTimeoutMs: 20 });

        const outcome = succeeded(await dispatcher.dispatch(envelope()));

        expect(outcome.credentialId).toBe("cred-2");
        expect(transitions.find((t) => t.name === "retrying")).toMatchObject({ error: { kind: "Timeout" } });
        expect(session.signals[0]?.aborted).toBe(true);
        expect(errorCounts()).toEqual([1, 0]);
    });

    describe("cancellation", () => {
        it("fails with Cancelled before selecting when the client already left", async () => {
            const session = new FakeSession(replyWith("ok"));
            const { pool, dispatcher } = setup(["A"], session);
            const client = new AbortController();
            client.abort();

            const outcome = failed(await dispatcher.dispatch(envelope(), client.signal));

            expect(outcome).toMatchObject({ attempts: 0, error: { kind: "Cancelled" } });
            expect(pool.status().credentials[0]?.lastUsed).toBe(0);
            expect(session.calls).toHaveLength(0);
        });

        it("aborts the in-flight send without penalising the credential", async () => {
            const session = new FakeSession(hangUntilAbort());
            const { dispatcher, errorCounts } = setup(["A", "B"], session);
            const client = new AbortController();
            setTimeout(() => client.abort(), 10);

            const env = envelope();
            const outcome = failed(await dispatcher.dispatch(env, client.signal));

            expect(outcome).toMatchObject({ attempts: 1, error: { kind: "Cancelled" } });
            expect(session.signals[0]?.aborted).toBe(true);
            expect(env.tried.size).toBe(0);
            expect(errorCounts()).toEqual([0, 0]);
        });
    });

    describe("streaming", () => {
        it("reports success only once the stream completes", async () => {
            const session = new FakeSession(replyWith("Hel", "lo"));
            const { pool, dispatcher, errorCounts } = setup(["A"], session);
            pool.reportFailure("cred-1");
            pool.reportFailure("cred-1");

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));
            expect(errorCounts()).toEqual([2]);

            expect(await drain(outcome.deltas)).toEqual(["Hel", "lo"]);
            expect(errorCounts()).toEqual([0]);
        });

        it("retries a failure that happens before the first delta", async () => {
            const session = new FakeSession(replyWith("ok"), {
                A: failWith(new GatewayError("RateLimited", "quota")),
            });
            const { dispatcher } = setup(["A", "B"], session);

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));

            expect(outcome).toMatchObject({ credentialId: "cred-2", attempts: 2 });
            expect(await drain(outcome.deltas)).toEqual(["ok"]);
        });

        it("surfaces a mid-stream failure without retrying", async () => {
            const session = new FakeSession(
                failWith(new GatewayError("NetworkError", "connection reset"), "partial"),
            );
            const { dispatcher, errorCounts } = setup(["A", "B"], session);

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));

            expect(await outcome.deltas.next()).toEqual({ done: false, value: "partial" });
            await expect(outcome.deltas.next()).rejects.toMatchObject({ kind: "NetworkError" });
            expect(errorCounts()).toEqual([1, 0]);
            expect(session.calls).toHaveLength(1);
        });

        it("fails a committed stream that stalls longer than the send timeout", async () => {
            const session = new FakeSession(hangUntilAbort("Hel"));
            const { dispatcher, errorCounts } = setup(["A", "B"], session, { sendTimeoutMs: 30 });

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));
            expect(await outcome.deltas.next()).toEqual({ done: false, value: "Hel" });

            await expect(outcome.deltas.next()).rejects.toMatchObject({
                kind: "Timeout",
                message: "Upstream stream stalled for 30ms",
            });
            expect(session.signals[0]?.aborted).toBe(true);
            expect(errorCounts()).toEqual([1, 0]);
            expect(session.calls).toHaveLength(1);
        });

        it("does not time out while deltas keep arriving", async () => {
            const session = new FakeSession(async function* () {
                for (const delta of ["a", "b", "c"]) {
                    await new Promise((resolve) => setTimeout(resolve, 15));
                    yield delta;
                }
            });
            const { dispatcher, errorCounts } = setup(["A"], session, { sendTimeoutMs: 40 });

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));

            expect(await drain(outcome.deltas)).toEqual(["a", "b", "c"]);
            expect(errorCounts()).toEqual([0]);
        });

        it("leaves the credential untouched when the consumer stops early", async () => {
            const session = new FakeSession(hangUntilAbort("a"));
            const { dispatcher, errorCounts } = setup(["A"], session);

            const outcome = succeeded(await dispatcher.dispatch(envelope(true)));
            expect(await outcome.deltas.next()).toEqual({ done: false, value: "a" });
            await outcome.deltas.return(undefined);

            expect(session.signals[0]?.aborted).toBe(true);
            expect(session.signals[0]?.reason).toMatchObject({ kind: "Cancelled" });
            expect(errorCounts()).toEqual([0]);
        });

        it("ends with Cancelled when the client disconnects mid-stream", async () => {
            const session = new FakeSession(hangUntilAbort("a"));
            const { dispatcher, errorCounts } = setup(["A"], session);
            const client = new AbortController();

            const outcome = succeeded(await dispatcher.dispatch(envelope(true), client.signal));
            expect(await outcome.deltas.next()).toEqual({ done: false, value: "a" });

            const pending = outcome.deltas.next();
            client.abort();

            await expect(pending).rejects.toMatchObject({ kind: "Cancelled" });
            expect(errorCounts()).toEqual([0]);
        });
    });
});
