/**
 * @centwise/server — Public API.
 */

export { FinanceService } from "./services/finance-service.js";
export type { FinanceServiceConfig, StoreDriver } from "./services/finance-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { seedDemoData, loadDemoSeed, DemoSeedSchema } from "./seed.js";
export type { DemoSeed, SeedOptions, SeedResult } from "./seed.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
