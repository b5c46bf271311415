/**
 * Tests for GET /api/v1/summary.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { createFixture, createTestApp, jsonRequest } from "./setup.js";
import type { Fixture } from "./setup.js";

let app: AppInstance["app"];
let fx: Fixture;

beforeEach(async () => {
  ({ app } = createTestApp());
  fx = await createFixture(app);
  await app.request(
    jsonRequest("/api/v1/expenses", "POST", {
      accountId: fx.checking,
      categoryId: fx.food,
      amount: "40",
      description: "Groceries",
    }),
  );
  await app.request(
    jsonRequest("/api/v1/incomes", "POST", { accountId: fx.savings, amount: "200", description: "Interest" }),
  );
});

describe("GET /api/v1/summary", () => {
  it("summarizes the current month", async () => {
    const res = await app.request("/api/v1/summary");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        period: { start: "2024-03-01", end: "2024-03-31", accountId: null },
        totals: {
          income: "200.00",
          transfersIn: "1000.00",
          incomeIncludingTransfers: "1200.00",
          expense: "40.00",
          net: "1160.00",
        },
        balances: {
          totalBalance: "1160.00",
          byAccount: [
            { accountId: fx.checking, account: "Checking", balance: "960.00" },
            { accountId: fx.savings, account: "Savings", balance: "200.00" },
          ],
        },
      },
    });
  });

  it("reports an explicit period without activity as zeros", async () => {
    const res = await app.request("/api/v1/summary?start=2024-01&end=2024-02");

    expect(await res.json()).toMatchObject({
      data: {
        period: { start: "2024-01-01", end: "2024-02-29", accountId: null },
        totals: { income: "0.00", transfersIn: "0.00", incomeIncludingTransfers: "0.00", expense: "0.00", net: "0.00" },
        balances: { totalBalance: "1160.00" },
      },
    });
  });

  it("restricts totals to one account", async () => {
    const res = await app.request(`/api/v1/summary?accountId=${String(fx.savings)}`);

    expect(await res.json()).toMatchObject({
      data: {
        period: { accountId: fx.savings },
        totals: { income: "200.00", transfersIn: "0.00", incomeIncludingTransfers: "200.00", expense: "0.00", net: "200.00" },
      },
    });
  });

  it("rejects a malformed period bound", async () => {
    const res = await app.request("/api/v1/summary?start=March");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_PERIOD", message: "Invalid 'start'. Use YYYY-MM or YYYY-MM-DD." },
    });
  });
});
