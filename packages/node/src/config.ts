/**
 * @feedguard/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord, Role } from "./types/auth.js";
import { isRole, ROLES } from "./types/auth.js";

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
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("feedguard"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly identity: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:identity1,key2:role2:identity2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, identity, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || identity === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:identity`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be one of: ${ROLES.join(", ")}`,
      );
    }
    if (identity === "") {
      throw new Error("Identity cannot be empty in API_KEYS");
    }

    keys.push({ key, role, identity });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Build the auth middleware configuration.
 *
 * @throws {Error} if neither API keys nor a JWT secret are configured
 */
export function buildAuthConfig(config: AppConfig): AuthConfig {
  const apiKeys = new Map<string, ApiKeyRecord>();
  for (const parsed of parseApiKeys(config.API_KEYS)) {
    apiKeys.set(parsed.key, parsed);
  }

  if (apiKeys.size === 0 && config.JWT_SECRET === undefined) {
    throw new Error("No credentials configured: set API_KEYS or JWT_SECRET");
  }

  return {
    apiKeys,
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}
