/**
 * Account routes.
 *
 * GET    /api/v1/accounts              — List accounts (cursor pagination)
 * POST   /api/v1/accounts              — Create an account at 0.00
 * GET    /api/v1/accounts/consistency  — Recompute balances and report drift
 * GET    /api/v1/accounts/:id          — Get a single account
 * PATCH  /api/v1/accounts/:id          — Rename an account
 * DELETE /api/v1/accounts/:id          — Delete an unreferenced account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema, NameSchema, PaginationQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { jsonBody, paramsOf, queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createAccountRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { ledger } = service;

  routes.get("/", queryOf(PaginationQuerySchema), async (c) => {
    const accounts = await ledger.listAccounts(c.get("auth").userId);
    return c.json(paginate(accounts, c.req.valid("query")));
  });

  routes.post("/", jsonBody(NameSchema), async (c) => {
    const account = await ledger.createAccount(c.get("auth").userId, c.req.valid("json"));
    return c.json({ data: account }, 201);
  });

  routes.get("/consistency", async (c) => {
    const report = await ledger.checkBalances(c.get("auth").userId);
    return c.json({ data: report });
  });

  routes.get("/:id", paramsOf(IdParamSchema), async (c) => {
    const account = await ledger.getAccount(c.get("auth").userId, c.req.valid("param").id);
    return c.json({ data: account });
  });

  routes.patch("/:id", paramsOf(IdParamSchema), jsonBody(NameSchema), async (c) => {
    const account = await ledger.renameAccount(
      c.get("auth").userId,
      c.req.valid("param").id,
      c.req.valid("json"),
    );
    return c.json({ data: account });
  });

  routes.delete("/:id", paramsOf(IdParamSchema), async (c) => {
    await ledger.deleteAccount(c.get("auth").userId, c.req.valid("param").id);
    return c.body(null, 204);
  });

  return routes;
}
