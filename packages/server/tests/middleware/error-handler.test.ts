/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { LedgerError } from "@centwise/ledger";
import type { LedgerErrorCode } from "@centwise/ledger";
import { ReportError } from "@centwise/reports";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { createTestApp, jsonRequest } from "../setup.js";

function throwing(err: unknown, unexpected: Array<{ message: string; requestId: string | undefined }> = []) {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware(() => "req-1"));
  app.onError(
    createErrorHandler({
      onUnexpected: (e, requestId) => unexpected.push({ message: e.message, requestId }),
    }),
  );
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("error handler", () => {
  const cases: Array<[LedgerErrorCode, number]> = [
    ["VALIDATION_ERROR", 400],
    ["INVALID_AMOUNT", 400],
    ["NOT_FOUND", 404],
    ["ACCOUNT_IN_USE", 409],
    ["CATEGORY_IN_USE", 409],
    ["INSUFFICIENT_FUNDS", 422],
    ["CONCURRENCY_TIMEOUT", 503],
  ];

  it.each(cases)("maps %s to %i", async (code, status) => {
    const res = await throwing(new LedgerError(code, "nope")).request("/boom");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: { code, message: "nope" } });
  });

  it("carries per-field messages", async () => {
    const err = new LedgerError("VALIDATION_ERROR", "Name must not be blank.", { name: "Name must not be blank." });

    const res = await throwing(err).request("/boom");

    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Name must not be blank.",
        details: { fields: { name: "Name must not be blank." } },
      },
    });
  });

  it("maps report period errors to 400", async () => {
    const res = await throwing(new ReportError("INVALID_PERIOD", "'start' cannot be after 'end'.")).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_PERIOD", message: "'start' cannot be after 'end'." },
    });
  });

  it("maps zod failures to field messages", async () => {
    const result = z.object({ accountId: z.number() }).safeParse({ accountId: "x" });
    if (result.success) throw new Error("Should have failed");

    const res = await throwing(result.error).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request validation failed",
        details: { fields: { accountId: "Expected number, received string" } },
      },
    });
  });

  it("maps client HTTPExceptions to 400", async () => {
    const res = await throwing(new HTTPException(400, { message: "Malformed JSON in request body" })).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Malformed JSON in request body" },
    });
  });

  it("hides unexpected errors and reports them with the request id", async () => {
    const unexpected: Array<{ message: string; requestId: string | undefined }> = [];

    const res = await throwing(new Error("db password is hunter2"), unexpected).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
    expect(unexpected).toEqual([{ message: "db password is hunter2", requestId: "req-1" }]);
  });
});

describe("error handler through the app", () => {
  it("rejects malformed JSON bodies", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/accounts", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });

  it("rejects bodies that fail the schema", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/accounts", "POST", { name: 42 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request validation failed",
        details: { fields: { name: "Expected string, received number" } },
      },
    });
  });

  it("rejects non-numeric ids", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/accounts/abc");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR", details: { fields: { id: expect.any(String) } } } });
  });
});
