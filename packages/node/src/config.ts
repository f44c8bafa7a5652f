/**
 * @streamledger/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Ledger
  LEDGER_OWNER: z.string().trim().min(1).default("owner"),
  MIN_STREAM_DURATION_SECONDS: z.coerce.number().int().min(1).default(300),

  // Persistence (in-memory when unset)
  STORE_PATH: z.string().trim().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly accountId: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:account1,key2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 2) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:accountId`,
      );
    }

    const [key = "", accountId = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (accountId === "") {
      throw new Error("Account ID cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, accountId });
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
