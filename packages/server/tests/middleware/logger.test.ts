/**
 * Tests for request logging and request ids.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { REQUEST_ID_HEADER } from "../../src/middleware/request-id.js";
import { createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs one entry per request with the acting user", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/accounts", "POST", { name: "Checking" }, { "X-User-Id": "alice", [REQUEST_ID_HEADER]: "abc-123" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/accounts",
      status: 201,
      requestId: "abc-123",
      userId: "alice",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs failed requests with their error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/api/v1/accounts/99");

    expect(entries[0]).toMatchObject({ method: "GET", status: 404, userId: "local" });
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a well-formed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { [REQUEST_ID_HEADER]: "trace-42" } });

    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("trace-42");
  });

  it("replaces a malformed id with a generated one", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { [REQUEST_ID_HEADER]: "bad id with spaces" } });

    const id = res.headers.get(REQUEST_ID_HEADER);
    expect(id).not.toBe("bad id with spaces");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("sets the header on error responses too", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/accounts/99", { headers: { [REQUEST_ID_HEADER]: "trace-43" } });

    expect(res.status).toBe(404);
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("trace-43");
  });
});
