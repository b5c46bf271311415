/**
 * Category routes.
 *
 * GET    /api/v1/categories      — List categories (cursor pagination)
 * POST   /api/v1/categories      — Create a category
 * GET    /api/v1/categories/:id  — Get a single category
 * PATCH  /api/v1/categories/:id  — Rename a category
 * DELETE /api/v1/categories/:id  — Delete a category no expense uses
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema, NameSchema, PaginationQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { jsonBody, paramsOf, queryOf } from "../middleware/validate.js";
import type { FinanceService } from "../services/finance-service.js";

export function createCategoryRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { ledger } = service;

  routes.get("/", queryOf(PaginationQuerySchema), async (c) => {
    const categories = await ledger.listCategories(c.get("auth").userId);
    return c.json(paginate(categories, c.req.valid("query")));
  });

  routes.post("/", jsonBody(NameSchema), async (c) => {
    const category = await ledger.createCategory(c.get("auth").userId, c.req.valid("json"));
    return c.json({ data: category }, 201);
  });

  routes.get("/:id", paramsOf(IdParamSchema), async (c) => {
    const category = await ledger.getCategory(c.get("auth").userId, c.req.valid("param").id);
    return c.json({ data: category });
  });

  routes.patch("/:id", paramsOf(IdParamSchema), jsonBody(NameSchema), async (c) => {
    const category = await ledger.renameCategory(
      c.get("auth").userId,
      c.req.valid("param").id,
      c.req.valid("json"),
    );
    return c.json({ data: category });
  });

  routes.delete("/:id", paramsOf(IdParamSchema), async (c) => {
    await ledger.deleteCategory(c.get("auth").userId, c.req.valid("param").id);
    return c.body(null, 204);
  });

  return routes;
}
