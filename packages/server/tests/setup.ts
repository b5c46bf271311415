/**
 * Test helpers for @centwise/server.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { z } from "zod";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const NOW = "2024-03-10T12:00:00.000Z";

/**
 * Create a test app on the in-memory store with a fixed clock.
 * Random salary deposits land at the midpoint of their range.
 */
export function createTestApp(options: Omit<CreateAppOptions, "serviceConfig"> = {}): AppInstance {
  return createApp({
    serviceConfig: {
      driver: "memory",
      clock: () => new Date(NOW),
      random: () => 0.5,
    },
    ...options,
  });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

const CreatedSchema = z.object({ data: z.object({ id: z.number() }) });

/** Read the id of the resource in a `{ data }` response. */
export async function idOf(res: Response): Promise<number> {
  return CreatedSchema.parse(await res.json()).data.id;
}

type Requester = AppInstance["app"];

export interface Fixture {
  readonly checking: number;
  readonly savings: number;
  readonly food: number;
}

/**
 * Two accounts and one category; Checking funded with a 1000.00 salary.
 */
export async function createFixture(app: Requester, headers?: Record<string, string>): Promise<Fixture> {
  const checking = await idOf(
    await app.request(jsonRequest("/api/v1/accounts", "POST", { name: "Checking" }, headers)),
  );
  const savings = await idOf(
    await app.request(jsonRequest("/api/v1/accounts", "POST", { name: "Savings" }, headers)),
  );
  const food = await idOf(
    await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Food" }, headers)),
  );
  await app.request(
    jsonRequest("/api/v1/transfers/salary", "POST", { accountId: checking, amount: "1000" }, headers),
  );
  return { checking, savings, food };
}

/** Current balance of an account as the API reports it. */
export async function balanceOf(app: Requester, accountId: number, headers?: Record<string, string>): Promise<string> {
  const res = await app.request(jsonRequest(`/api/v1/accounts/${String(accountId)}`, "GET", undefined, headers));
  return z.object({ data: z.object({ balance: z.string() }) }).parse(await res.json()).data.balance;
}

const NextPageSchema = z.object({ pagination: z.object({ cursor: z.string(), hasMore: z.literal(true) }) });

/** Cursor of the next page; fails the parse when there is none. */
export function nextCursor(body: unknown): string {
  return NextPageSchema.parse(body).pagination.cursor;
}
