/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './logging/handler.js';

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  pageSize: z.number().int().min(1).max(1000).default(50),
  requestTimeoutMs: z.number().int().min(0).default(30000),
  shutdownTimeoutMs: z.number().int().min(0).default(10000),
  debug: z.boolean().default(false),
  logLevel: LogLevelSchema.default('info'),
  maxDice: z.number().int().min(1).max(100000).default(1000),
  maxRerolls: z.number().int().min(1).max(100000).default(1000),
  maxBatchSize: z.number().int().min(1).max(1000).default(100),
  /** Seeds a reproducible random source; unset means crypto randomness */
  seed: z.string().min(1).optional(),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a boolean from environment variable string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable string. Anything unparseable
 * is passed through so the schema reports it.
 */
function parseInteger(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : value;
}

/**
 * Load configuration from environment variables
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    pageSize: parseInteger(env['MCP_PAGE_SIZE']),
    requestTimeoutMs: parseInteger(env['MCP_REQUEST_TIMEOUT_MS']),
    shutdownTimeoutMs: parseInteger(env['MCP_SHUTDOWN_TIMEOUT_MS']),
    debug: parseBoolean(env['MCP_DEBUG'], false),
    logLevel: env['MCP_LOG_LEVEL'] || undefined,
    maxDice: parseInteger(env['DICE_MAX_DICE']),
    maxRerolls: parseInteger(env['DICE_MAX_REROLLS']),
    maxBatchSize: parseInteger(env['DICE_MAX_BATCH_SIZE']),
    seed: env['DICE_SEED'] || undefined,
  };

  // Drop undefined values so defaults apply
  const configInput = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  return ConfigSchema.parse(configInput);
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
