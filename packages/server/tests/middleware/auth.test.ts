/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired)
 * - Acting user in unsecured mode
 * - Users only see their own rows
 */

import { createHmac } from "node:crypto";
import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { actingUserMiddleware, authMiddleware, signJwt, verifyJwt } from "../../src/middleware/auth.js";
import { createTestApp, jsonRequest } from "../setup.js";

const JWT_SECRET = "test-secret";
const HOUR_FROM_NOW = Math.floor(Date.now() / 1000) + 3600;

interface MakeAppOptions {
  readonly apiKeys?: readonly ApiKeyRecord[];
  /** Leave JWT verification unconfigured. */
  readonly withoutJwt?: boolean;
}

function makeApp({ apiKeys = [], withoutJwt = false }: MakeAppOptions = {}) {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: new Map(apiKeys.map((k): [string, ApiKeyRecord] => [k.key, k])),
      jwtSecret: withoutJwt ? undefined : JWT_SECRET,
      jwtIssuer: "centwise",
    }),
  );
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  return app;
}

describe("API Key auth", () => {
  it("authenticates with a valid API key", async () => {
    const app = makeApp({ apiKeys: [{ key: "key-1", userId: "alice" }] });

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: { type: "api-key", userId: "alice" } });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp({ apiKeys: [{ key: "key-1", userId: "alice" }] });

    const res = await app.request("/test", { headers: { "X-Api-Key": "invalid-key" } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Invalid API key" } });
  });

  it("returns 401 when no auth is provided", async () => {
    const res = await makeApp().request("/test");
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Authentication required" } });
  });
});

describe("JWT Bearer auth", () => {
  it("authenticates with a valid JWT", async () => {
    const token = signJwt({ sub: "bob", iss: "centwise", exp: HOUR_FROM_NOW }, JWT_SECRET);

    const res = await makeApp().request("/test", { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: { type: "jwt", userId: "bob" } });
  });

  it("returns 401 for an expired JWT", async () => {
    const token = signJwt({ sub: "bob", iss: "centwise", exp: Math.floor(Date.now() / 1000) - 100 }, JWT_SECRET);

    const res = await makeApp().request("/test", { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const token = signJwt({ sub: "bob", iss: "centwise", exp: HOUR_FROM_NOW }, JWT_SECRET);
    const tampered = token.slice(0, -5) + "XXXXX";

    const res = await makeApp().request("/test", { headers: { Authorization: `Bearer ${tampered}` } });

    expect(res.status).toBe(401);
  });

  it("returns 401 when JWT auth is not configured", async () => {
    const token = signJwt({ sub: "bob", exp: HOUR_FROM_NOW }, JWT_SECRET);

    const res = await makeApp({ withoutJwt: true }).request("/test", { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "JWT authentication not configured" },
    });
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const token = signJwt({ sub: "bob", iss: "centwise", exp: 2000, iat: 1000 }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "centwise", 1500)).toEqual({
      sub: "bob",
      iss: "centwise",
      exp: 2000,
      iat: 1000,
    });
  });

  it("returns undefined for malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for wrong issuer or secret", () => {
    const token = signJwt({ sub: "bob", iss: "wrong-issuer", exp: HOUR_FROM_NOW }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "centwise")).toBeUndefined();
    expect(verifyJwt(token, "other-secret")).toBeUndefined();
  });

  it("returns undefined when required claims are missing", () => {
    const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
    const payload = Buffer.from(JSON.stringify({ exp: HOUR_FROM_NOW, iat: 0 })).toString("base64url");
    const signature = createHmac("sha256", JWT_SECRET).update(`${header}.${payload}`).digest("base64url");

    expect(verifyJwt(`${header}.${payload}.${signature}`, JWT_SECRET)).toBeUndefined();
  });
});

describe("acting user (unsecured mode)", () => {
  function unsecured() {
    const app = new Hono<AppEnv>();
    app.use("*", actingUserMiddleware("local"));
    app.get("/test", (c) => c.json({ auth: c.get("auth") }));
    return app;
  }

  it("uses X-User-Id when present", async () => {
    const res = await unsecured().request("/test", { headers: { "X-User-Id": "carol" } });
    expect(await res.json()).toEqual({ auth: { type: "header", userId: "carol" } });
  });

  it("falls back to the default user", async () => {
    const res = await unsecured().request("/test", { headers: { "X-User-Id": "  " } });
    expect(await res.json()).toEqual({ auth: { type: "default", userId: "local" } });
  });
});

describe("per-user scoping", () => {
  it("keys map to separate users", async () => {
    const { app } = createTestApp({
      auth: {
        apiKeys: new Map([
          ["key-a", { key: "key-a", userId: "alice" }],
          ["key-b", { key: "key-b", userId: "bob" }],
        ]),
      },
    });

    const created = await app.request(
      jsonRequest("/api/v1/accounts", "POST", { name: "Wallet" }, { "X-Api-Key": "key-a" }),
    );
    expect(created.status).toBe(201);

    const mine = await app.request(jsonRequest("/api/v1/accounts", "GET", undefined, { "X-Api-Key": "key-a" }));
    const theirs = await app.request(jsonRequest("/api/v1/accounts", "GET", undefined, { "X-Api-Key": "key-b" }));

    expect(await mine.json()).toMatchObject({ data: [{ name: "Wallet", userId: "alice" }] });
    expect(await theirs.json()).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });

    const foreign = await app.request(jsonRequest("/api/v1/accounts/1", "GET", undefined, { "X-Api-Key": "key-b" }));
    expect(foreign.status).toBe(404);
  });
});
