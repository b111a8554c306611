/**
 * Centralized Configuration Module
 *
 * Builds a validated configuration object from environment variables.
 * Command-line flags are applied on top by the CLI via `applyOverrides`.
 *
 * Environment variables:
 * - INTERVAL_DRILL_DB: path to the SQLite database
 * - INTERVAL_DRILL_TTS: shell command that reads text aloud from stdin
 * - INTERVAL_DRILL_REVIEWS: growth parameter, correct reviews to reach the maximum interval
 * - INTERVAL_DRILL_HOURS: growth parameter, maximum interval in hours
 * - XDG_CONFIG_HOME / APPDATA: base directory for the default database path
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig();
 *   console.log(config.database.path);
 *
 * @module config
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_GROWTH_PARAMS } from './core/scheduling/interval-table';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  database: z.object({
    path: z.string().min(1, 'must not be empty'),
  }),

  scheduling: z.object({
    reviews: z.number().int().positive().default(DEFAULT_GROWTH_PARAMS.reviews),
    hours: z.number().int().nonnegative().default(DEFAULT_GROWTH_PARAMS.hours),
  }),

  speech: z.object({
    command: z.string().min(1).optional(),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/**
 * Values the CLI may override. Undefined fields keep the configured value.
 */
export interface ConfigOverrides {
  databasePath?: string;
  reviews?: number;
  hours?: number;
  speechCommand?: string;
}

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Directory that holds the default database, following the platform
 * convention for per-user configuration.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.APPDATA || env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'interval-drill');
}

/**
 * Parse a number from an environment variable string.
 * Returns undefined when unset, and NaN when set to something non-numeric so
 * that validation reports it instead of silently using the default.
 */
function parseNumberOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Load raw configuration values from environment variables.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): z.input<typeof configSchema> {
  return {
    database: {
      path: env.INTERVAL_DRILL_DB || join(getConfigDir(env), 'interval-drill.db'),
    },
    scheduling: {
      reviews: parseNumberOrUndefined(env.INTERVAL_DRILL_REVIEWS),
      hours: parseNumberOrUndefined(env.INTERVAL_DRILL_HOURS),
    },
    speech: {
      command: env.INTERVAL_DRILL_TTS || undefined,
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error listing every invalid setting.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses raw values against the schema.
 *
 * @throws {ConfigValidationError} naming each invalid setting
 */
function parseConfig(raw: z.input<typeof configSchema>): Config {
  const result = configSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const invalidVars = result.error.issues.map((issue) => ({
    name: issue.path.join('.'),
    reason: issue.message,
  }));
  const details = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
  throw new ConfigValidationError(`Invalid configuration: ${details}`, invalidVars);
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * Loads and validates configuration from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigValidationError} if a value is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ INTERVAL_DRILL_DB: '/tmp/drill.db' });
 * config.database.path;        // '/tmp/drill.db'
 * config.scheduling.reviews;   // 20
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return parseConfig(loadFromEnvironment(env));
}

/**
 * Returns a new configuration with command-line overrides applied and
 * validated.
 *
 * @throws {ConfigValidationError} if an override is invalid
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  return parseConfig({
    database: {
      path: overrides.databasePath ?? config.database.path,
    },
    scheduling: {
      reviews: overrides.reviews ?? config.scheduling.reviews,
      hours: overrides.hours ?? config.scheduling.hours,
    },
    speech: {
      command: overrides.speechCommand ?? config.speech.command,
    },
  });
}
