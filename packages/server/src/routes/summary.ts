/**
 * Summary route.
 *
 * GET /api/v1/summary — Period totals plus current balances
 *                       (defaults to the current month)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReportQuerySchema } from "../types/dto.js";
import { queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createSummaryRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", queryOf(ReportQuerySchema), async (c) => {
    const summary = await service.reporter.summary(c.get("auth").userId, c.req.valid("query"));
    return c.json({ data: summary });
  });

  return routes;
}
