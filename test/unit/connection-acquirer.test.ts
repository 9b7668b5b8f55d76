import { describe, it, expect, vi } from "vitest";
import { acquireConnection, type AcquireOutcome } from "../../src/connection-acquirer.js";
import { createPoolKey } from "../../src/pool-key.js";
import { FakeConnection, FakePool, flushPromises } from "../helpers/fakes.js";

const key = createPoolKey({ host: "example.com", port: 443 }, "h2");

describe("acquireConnection", () => {
  it("should continue synchronously with a ready connection", () => {
    const connection = new FakeConnection();
    const continuation = vi.fn();

    acquireConnection(FakePool.ready(connection), key, continuation);

    expect(continuation).toHaveBeenCalledTimes(1);
    expect(continuation).toHaveBeenCalledWith({ ok: true, connection });
  });

  it("should continue synchronously with a failed acquisition", () => {
    const cause = new Error("pool exhausted");
    const continuation = vi.fn();

    acquireConnection(new FakePool(() => ({ status: "failed", cause })), key, continuation);

    expect(continuation).toHaveBeenCalledWith({ ok: false, cause });
  });

  it("should treat a throwing pool as a failed acquisition", () => {
    const continuation = vi.fn();
    const pool = new FakePool(() => {
      throw new Error("pool bug");
    });

    acquireConnection(pool, key, continuation);

    const outcome: AcquireOutcome<FakeConnection> = continuation.mock.calls[0][0];
    expect(outcome.ok).toBe(false);
    expect(outcome).toMatchObject({ cause: { message: "pool bug" } });
  });

  it("should not continue before a pending acquisition settles", async () => {
    const connection = new FakeConnection();
    let resolve: (c: FakeConnection) => void = () => {};
    const promise = new Promise<FakeConnection>(r => {
      resolve = r;
    });
    const continuation = vi.fn();

    acquireConnection(new FakePool(() => ({ status: "pending", promise })), key, continuation);
    expect(continuation).not.toHaveBeenCalled();

    resolve(connection);
    await flushPromises();
    expect(continuation).toHaveBeenCalledWith({ ok: true, connection });
  });

  it("should pass a pending rejection through, wrapping non-errors", async () => {
    const continuation = vi.fn();
    const promise = Promise.reject("connect refused");

    acquireConnection(new FakePool(() => ({ status: "pending", promise })), key, continuation);
    await flushPromises();

    const outcome: AcquireOutcome<FakeConnection> = continuation.mock.calls[0][0];
    expect(outcome).toMatchObject({ ok: false, cause: { message: "connect refused" } });
  });

  it("should log a throwing continuation instead of leaving a rejection unhandled", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const promise = Promise.resolve(new FakeConnection());
      acquireConnection(new FakePool(() => ({ status: "pending", promise })), key, () => {
        throw new Error("continuation bug");
      });
      await flushPromises();
      expect(warn).toHaveBeenCalledWith(
        "[acquire] h2://example.com:443 continuation threw",
        expect.objectContaining({ message: "continuation bug" }),
      );
    } finally {
      warn.mockRestore();
    }
  });
});
