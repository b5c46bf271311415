/**
 * @centwise/server — Entry point.
 *
 * Loads config, builds the service and Hono app, optionally seeds demo
 * data, starts the HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { FinanceService } from "./services/finance-service.js";
import { seedDemoData } from "./seed.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn(
      { defaultUserId: config.DEFAULT_USER_ID },
      "No API keys or JWT secret configured, running in unsecured mode",
    );
  }

  const service = new FinanceService({
    driver: config.STORE_DRIVER,
    databasePath: config.DATABASE_PATH,
    lockTimeoutMs: config.LOCK_TIMEOUT_MS,
  });
  logger.info(
    { driver: config.STORE_DRIVER, databasePath: config.STORE_DRIVER === "sqlite" ? config.DATABASE_PATH : undefined },
    "Store opened",
  );

  if (config.SEED_DEMO_DATA) {
    const result = await seedDemoData(service.ledger, config.DEFAULT_USER_ID);
    logger.info({ userId: config.DEFAULT_USER_ID, ...result }, "Demo data seeding finished");
  }

  const { app } = createApp({
    service,
    defaultUserId: config.DEFAULT_USER_ID,
    auth: authConfig,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "centwise server started");

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
