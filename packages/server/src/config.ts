/**
 * @centwise/server — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("centwise"),
  DEFAULT_USER_ID: z.string().min(1).default("local"),

  // Storage
  STORE_DRIVER: z.enum(["memory", "sqlite"]).default("memory"),
  DATABASE_PATH: z.string().min(1).default("centwise.db"),
  LOCK_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),

  // Demo data
  SEED_DEMO_DATA: booleanFlag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly userId: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:user1,key2:user2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, userId] = parts;
    if (parts.length !== 2 || key === undefined || userId === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:userId`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (userId === "") {
      throw new Error("User ID cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }

    seen.add(key);
    keys.push({ key, userId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
