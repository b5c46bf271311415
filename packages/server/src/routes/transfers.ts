/**
 * Transfer routes.
 *
 * GET    /api/v1/transfers                — List transfers (filters: fromAccountId, toAccountId, start, end)
 * POST   /api/v1/transfers                — Move money between two own accounts
 * GET    /api/v1/transfers/total          — Count and sum of matching transfers
 * POST   /api/v1/transfers/salary         — Deposit from outside into an account
 * POST   /api/v1/transfers/salary/random  — Deposit a random amount in [min, max]
 * GET    /api/v1/transfers/:id            — Get a single transfer
 * PATCH  /api/v1/transfers/:id            — Edit a transfer
 * DELETE /api/v1/transfers/:id            — Delete a transfer
 *
 * Transfers never overdraw the source account; a rejected transfer
 * changes no balance.
 */

import { Hono } from "hono";
import { resolvePeriod } from "@centwise/reports";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateTransferSchema,
  IdParamSchema,
  ListTransfersQuerySchema,
  RandomSalarySchema,
  SalarySchema,
  TransferTotalQuerySchema,
  UpdateTransferSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { jsonBody, paramsOf, queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createTransferRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { ledger, reporter } = service;

  routes.get("/", queryOf(ListTransfersQuerySchema), async (c) => {
    const query = c.req.valid("query");
    const { from, to } = resolvePeriod(query);
    const transfers = await ledger.listTransfers(c.get("auth").userId, {
      fromAccountId: query.fromAccountId,
      toAccountId: query.toAccountId,
      from,
      to,
    });
    return c.json(paginate(transfers, query));
  });

  routes.post("/", jsonBody(CreateTransferSchema), async (c) => {
    const transfer = await ledger.applyTransfer(c.get("auth").userId, {
      op: "create",
      input: c.req.valid("json"),
    });
    return c.json({ data: transfer }, 201);
  });

  routes.get("/total", queryOf(TransferTotalQuerySchema), async (c) => {
    const total = await reporter.transferTotal(c.get("auth").userId, c.req.valid("query"));
    return c.json({ data: total });
  });

  routes.post("/salary", jsonBody(SalarySchema), async (c) => {
    const transfer = await ledger.depositFromExternal(c.get("auth").userId, c.req.valid("json"));
    return c.json({ data: transfer }, 201);
  });

  routes.post("/salary/random", jsonBody(RandomSalarySchema), async (c) => {
    const transfer = await ledger.depositRandomFromExternal(
      c.get("auth").userId,
      c.req.valid("json"),
      service.random,
    );
    return c.json({ data: transfer }, 201);
  });

  routes.get("/:id", paramsOf(IdParamSchema), async (c) => {
    const transfer = await ledger.getTransfer(c.get("auth").userId, c.req.valid("param").id);
    return c.json({ data: transfer });
  });

  routes.patch("/:id", paramsOf(IdParamSchema), jsonBody(UpdateTransferSchema), async (c) => {
    const transfer = await ledger.applyTransfer(c.get("auth").userId, {
      op: "update",
      id: c.req.valid("param").id,
      patch: c.req.valid("json"),
    });
    return c.json({ data: transfer });
  });

  routes.delete("/:id", paramsOf(IdParamSchema), async (c) => {
    await ledger.applyTransfer(c.get("auth").userId, { op: "delete", id: c.req.valid("param").id });
    return c.body(null, 204);
  });

  return routes;
}
