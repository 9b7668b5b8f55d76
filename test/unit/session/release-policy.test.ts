import { describe, it, expect, vi } from "vitest";
import { HttpRequest } from "../../../src/http/request.js";
import { DecodedHttpResponse } from "../../../src/http/response.js";
import { createPoolKey } from "../../../src/pool-key.js";
import {
  ConnectionLease,
  scheduleRelease,
  selectReleaseTrigger,
} from "../../../src/session/release-policy.js";
import { FakeConnection, FakePool, flushPromises } from "../../helpers/fakes.js";

const key = createPoolKey({ host: "example.com", port: 443 }, "https");

function lease() {
  const connection = new FakeConnection();
  const pool = FakePool.ready(connection);
  return { pool, connection, lease: new ConnectionLease(pool, key, connection) };
}

describe("selectReleaseTrigger", () => {
  it("should release multiplexed connections immediately", () => {
    expect(selectReleaseTrigger("h2", false)).toBe("immediate");
    expect(selectReleaseTrigger("h2c", true)).toBe("immediate");
  });

  it("should wait for the request when pipelining HTTP/1", () => {
    expect(selectReleaseTrigger("h1", true)).toBe("after-request-sent");
    expect(selectReleaseTrigger("h1c", true)).toBe("after-request-sent");
  });

  it("should wait for the response otherwise", () => {
    expect(selectReleaseTrigger("h1", false)).toBe("after-response-complete");
    expect(selectReleaseTrigger("http", false)).toBe("after-response-complete");
  });
});

describe("ConnectionLease", () => {
  it("should release to the pool at most once", () => {
    const { pool, connection, lease: l } = lease();

    expect(l.release()).toBe(true);
    expect(l.release()).toBe(false);
    expect(l.released).toBe(true);
    expect(pool.released).toEqual([{ key, connection }]);
  });

  it("should log instead of throwing when the pool fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const { pool, connection, lease: l } = lease();
      pool.releaseError = new Error("pool bug");

      expect(l.release()).toBe(true);
      expect(warn).toHaveBeenCalledWith(
        `[release] failed to return connection ${connection.id} to the pool (https://example.com:443)`,
        pool.releaseError,
      );
      expect(l.release()).toBe(false);
    } finally {
      warn.mockRestore();
    }
  });
});

describe("scheduleRelease", () => {
  it("should release right away for the immediate trigger", () => {
    const { pool, lease: l } = lease();
    scheduleRelease("immediate", l, HttpRequest.of(), new DecodedHttpResponse());
    expect(pool.released).toHaveLength(1);
  });

  it("should release once the request is sent, before the response completes", async () => {
    const { pool, lease: l } = lease();
    const req = HttpRequest.of();
    const res = new DecodedHttpResponse();
    scheduleRelease("after-request-sent", l, req, res);

    await flushPromises();
    expect(pool.released).toHaveLength(0);

    req.close();
    await flushPromises();
    expect(pool.released).toHaveLength(1);
    expect(res.isOpen).toBe(true);
  });

  it("should release when sending the request fails", async () => {
    const { pool, lease: l } = lease();
    const req = HttpRequest.of();
    scheduleRelease("after-request-sent", l, req, new DecodedHttpResponse());

    req.close(new Error("broken pipe"));
    await flushPromises();
    expect(pool.released).toHaveLength(1);
  });

  it("should not release on request completion when waiting for the response", async () => {
    const { pool, lease: l } = lease();
    const req = HttpRequest.of();
    const res = new DecodedHttpResponse();
    scheduleRelease("after-response-complete", l, req, res);

    req.close();
    await flushPromises();
    expect(pool.released).toHaveLength(0);

    res.close();
    await flushPromises();
    expect(pool.released).toHaveLength(1);
  });

  it("should release when the response fails or is abandoned", async () => {
    const failed = lease();
    const failedRes = new DecodedHttpResponse();
    scheduleRelease("after-response-complete", failed.lease, HttpRequest.of(), failedRes);
    failedRes.close(new Error("reset"));

    const abandoned = lease();
    const abandonedRes = new DecodedHttpResponse();
    scheduleRelease("after-response-complete", abandoned.lease, HttpRequest.of(), abandonedRes);
    abandonedRes.abort();

    await flushPromises();
    expect(failed.pool.released).toHaveLength(1);
    expect(abandoned.pool.released).toHaveLength(1);
  });

  it("should track completion through any view of the request", async () => {
    const { pool, lease: l } = lease();
    const original = HttpRequest.of({ path: "//a" });
    const normalized = original.withPath("/a");
    scheduleRelease("after-request-sent", l, normalized, new DecodedHttpResponse());

    original.close();
    await flushPromises();
    expect(pool.released).toHaveLength(1);
  });
});
