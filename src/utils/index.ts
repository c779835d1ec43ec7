/**
 * Shared utilities
 */

import { ConfigError, ErrorCode } from "../core/errors.js";
import { type EngineSettings, EngineSettingsSchema, formatZodError } from "./validation.js";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

export * from "./delimited.js";
export * from "./validation.js";

// =============================================================================
// Engine Settings
// =============================================================================

export const ENV_MAX_SQL_VARS = "ONTOMOD_MAX_SQL_VARS";
export const ENV_STATEMENT_TABLE = "ONTOMOD_STATEMENT_TABLE";

/**
 * Engine settings from the environment, with defaults
 *
 * @throws {ConfigError} when a variable is set to an invalid value
 */
export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const parsed = EngineSettingsSchema.safeParse({
    maxSqlVars: env[ENV_MAX_SQL_VARS] || undefined,
    statementTable: env[ENV_STATEMENT_TABLE] || undefined,
  });
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid engine settings: ${formatZodError(parsed.error).join("; ")}`,
      ErrorCode.CONFIG_INVALID
    );
  }
  return parsed.data;
}

// =============================================================================
// Collections
// =============================================================================

/**
 * Split an array into consecutive slices of at most `size` items
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`Chunk size must be positive, got ${size}`);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
