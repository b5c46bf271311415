/**
 * Income routes.
 *
 * GET    /api/v1/incomes         — List incomes (filters: accountId, start, end)
 * POST   /api/v1/incomes         — Record an income
 * GET    /api/v1/incomes/total   — Income total, deposits from outside included
 * GET    /api/v1/incomes/:id     — Get a single income
 * PATCH  /api/v1/incomes/:id     — Edit an income
 * DELETE /api/v1/incomes/:id     — Delete an income
 */

import { Hono } from "hono";
import { resolvePeriod } from "@centwise/reports";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateIncomeSchema,
  IdParamSchema,
  ListEntriesQuerySchema,
  ReportQuerySchema,
  UpdateIncomeSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { jsonBody, paramsOf, queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createIncomeRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { ledger, reporter } = service;

  routes.get("/", queryOf(ListEntriesQuerySchema), async (c) => {
    const query = c.req.valid("query");
    const { from, to } = resolvePeriod(query);
    const incomes = await ledger.listIncomes(c.get("auth").userId, {
      accountId: query.accountId,
      from,
      to,
    });
    return c.json(paginate(incomes, query));
  });

  routes.post("/", jsonBody(CreateIncomeSchema), async (c) => {
    const income = await ledger.applyIncome(c.get("auth").userId, {
      op: "create",
      input: c.req.valid("json"),
    });
    return c.json({ data: income }, 201);
  });

  routes.get("/total", queryOf(ReportQuerySchema), async (c) => {
    const total = await reporter.incomeTotal(c.get("auth").userId, c.req.valid("query"));
    return c.json({ data: total });
  });

  routes.get("/:id", paramsOf(IdParamSchema), async (c) => {
    const income = await ledger.getIncome(c.get("auth").userId, c.req.valid("param").id);
    return c.json({ data: income });
  });

  routes.patch("/:id", paramsOf(IdParamSchema), jsonBody(UpdateIncomeSchema), async (c) => {
    const income = await ledger.applyIncome(c.get("auth").userId, {
      op: "update",
      id: c.req.valid("param").id,
      patch: c.req.valid("json"),
    });
    return c.json({ data: income });
  });

  routes.delete("/:id", paramsOf(IdParamSchema), async (c) => {
    await ledger.applyIncome(c.get("auth").userId, { op: "delete", id: c.req.valid("param").id });
    return c.body(null, 204);
  });

  return routes;
}
