/**
 * Tests for liveness and readiness probes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns ok without auth", async () => {
    const { app } = createTestApp({ auth: { apiKeys: new Map() } });

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });
});

describe("GET /ready", () => {
  it("is ready while the store is open", async () => {
    const { app } = createTestApp();

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ready",
      store: { driver: "memory", status: "ok" },
    });
  });

  it("is not ready after the service stopped", async () => {
    const { app, service } = createTestApp();
    await service.stop();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      status: "not_ready",
      store: { driver: "memory", status: "down" },
    });
  });
});

describe("unknown routes", () => {
  it("answer with the error envelope", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "Route not found" } });
  });
});
