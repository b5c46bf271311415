/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (the store answers a read)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { FinanceService } from "../services/finance-service.js";

export function createHealthRoutes(
  service: FinanceService,
  clock: () => Date = () => new Date(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: clock().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const ready = await service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        store: { driver: service.driver, status: ready ? "ok" : "down" },
        timestamp: clock().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
