/**
 * Expense routes.
 *
 * GET    /api/v1/expenses                     — List expenses (filters: accountId, start, end)
 * POST   /api/v1/expenses                     — Record an expense
 * GET    /api/v1/expenses/totals-by-category  — Expense totals per category
 * GET    /api/v1/expenses/monthly-cashflow    — Income/expense per month (?by=)
 * GET    /api/v1/expenses/:id                 — Get a single expense
 * PATCH  /api/v1/expenses/:id                 — Edit an expense
 * DELETE /api/v1/expenses/:id                 — Delete an expense
 *
 * Every write moves the account balance in the same transaction.
 */

import { Hono } from "hono";
import { resolvePeriod } from "@centwise/reports";
import type { AppEnv } from "../types/api-contract.js";
import {
  CashflowQuerySchema,
  CreateExpenseSchema,
  IdParamSchema,
  ListEntriesQuerySchema,
  ReportQuerySchema,
  UpdateExpenseSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { jsonBody, paramsOf, queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createExpenseRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { ledger, reporter } = service;

  routes.get("/", queryOf(ListEntriesQuerySchema), async (c) => {
    const query = c.req.valid("query");
    const { from, to } = resolvePeriod(query);
    const expenses = await ledger.listExpenses(c.get("auth").userId, {
      accountId: query.accountId,
      from,
      to,
    });
    return c.json(paginate(expenses, query));
  });

  routes.post("/", jsonBody(CreateExpenseSchema), async (c) => {
    const expense = await ledger.applyExpense(c.get("auth").userId, {
      op: "create",
      input: c.req.valid("json"),
    });
    return c.json({ data: expense }, 201);
  });

  routes.get("/totals-by-category", queryOf(ReportQuerySchema), async (c) => {
    const totals = await reporter.totalsByCategory(c.get("auth").userId, c.req.valid("query"));
    return c.json({ data: totals });
  });

  routes.get("/monthly-cashflow", queryOf(CashflowQuerySchema), async (c) => {
    const rows = await reporter.monthlyCashflow(c.get("auth").userId, c.req.valid("query"));
    return c.json({ data: rows });
  });

  routes.get("/:id", paramsOf(IdParamSchema), async (c) => {
    const expense = await ledger.getExpense(c.get("auth").userId, c.req.valid("param").id);
    return c.json({ data: expense });
  });

  routes.patch("/:id", paramsOf(IdParamSchema), jsonBody(UpdateExpenseSchema), async (c) => {
    const expense = await ledger.applyExpense(c.get("auth").userId, {
      op: "update",
      id: c.req.valid("param").id,
      patch: c.req.valid("json"),
    });
    return c.json({ data: expense });
  });

  routes.delete("/:id", paramsOf(IdParamSchema), async (c) => {
    await ledger.applyExpense(c.get("auth").userId, { op: "delete", id: c.req.valid("param").id });
    return c.body(null, 204);
  });

  return routes;
}
