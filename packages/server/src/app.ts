/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests call it
 * directly; main.ts adds the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { FinanceService } from "./services/finance-service.js";
import type { FinanceServiceConfig } from "./services/finance-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { ErrorHandlerOptions } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { actingUserMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createCategoryRoutes } from "./routes/categories.js";
import { createExpenseRoutes } from "./routes/expenses.js";
import { createIncomeRoutes } from "./routes/incomes.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createSummaryRoutes } from "./routes/summary.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Builds a fresh FinanceService. Ignored when `service` is given. */
  readonly serviceConfig?: FinanceServiceConfig;
  /** An already-built service, e.g. one the bootstrap seeded. */
  readonly service?: FinanceService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called with every unexpected (500) error. */
  readonly onUnexpectedError?: ErrorHandlerOptions["onUnexpected"];
  /** Acting user when no auth is configured and no X-User-Id is sent. Default "local". */
  readonly defaultUserId?: string;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FinanceService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service =
    options.service ?? new FinanceService(options.serviceConfig ?? { driver: "memory" });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler({ onUnexpected: options.onUnexpectedError }));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-User-Id header or default user
    app.use("/api/*", actingUserMiddleware(options.defaultUserId ?? "local"));
  }

  app.route("/api/v1/accounts", createAccountRoutes(service));
  app.route("/api/v1/categories", createCategoryRoutes(service));
  app.route("/api/v1/expenses", createExpenseRoutes(service));
  app.route("/api/v1/incomes", createIncomeRoutes(service));
  app.route("/api/v1/transfers", createTransferRoutes(service));
  app.route("/api/v1/summary", createSummaryRoutes(service));

  return { app, service };
}
