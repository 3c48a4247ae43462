/**
 * @flatchain/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  // Storage
  FLATCHAIN_DATA_DIR: z.string().min(1).default("./data"),
  FLATCHAIN_SEGMENT_THRESHOLD: z.coerce.number().int().min(1).default(100),

  // Chain parameters (fixed once a store is initialized)
  FLATCHAIN_DIFFICULTY_BITS: z.coerce.number().int().min(0).max(32).default(15),
  FLATCHAIN_SUBSIDY: z.coerce.number().int().min(1).default(50),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
