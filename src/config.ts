/**
 * Codec Configuration
 *
 * Process-wide defaults for decode and encode options, read from the
 * environment once and cached. Options passed to an individual call always
 * win over these defaults.
 *
 * ENVIRONMENT:
 * - JSON_STRICT_FIELDS: reject unknown object keys (default true)
 * - JSON_DUPLICATE_KEYS: "error" or "lastWins" (default "error")
 * - JSON_DUPLICATE_ELEMENTS: "error" or "ignore" (default "error")
 * - JSON_MAX_DEPTH: maximum nesting of arrays and objects (default 512)
 * - JSON_LOG_LEVEL: "none", "error", "warn", "info" or "debug" (default "warn")
 *
 * Invalid values throw on first access with a message naming the variable.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['none', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type DuplicateKeyPolicy = 'error' | 'lastWins';

export type DuplicateElementPolicy = 'error' | 'ignore';

export interface CodecConfig {
  strictFields: boolean;
  duplicateKeys: DuplicateKeyPolicy;
  duplicateElements: DuplicateElementPolicy;
  maxDepth: number;
  logLevel: LogLevel;
}

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  JSON_STRICT_FIELDS: booleanFlag,
  JSON_DUPLICATE_KEYS: z.enum(['error', 'lastWins']).default('error'),
  JSON_DUPLICATE_ELEMENTS: z.enum(['error', 'ignore']).default('error'),
  JSON_MAX_DEPTH: z.coerce.number().int().positive().default(512),
  JSON_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

/**
 * Validate and load configuration from environment variables
 *
 * Empty strings are treated as unset so `JSON_MAX_DEPTH=` falls back to the
 * default instead of failing the number check.
 *
 * @throws {Error} If any variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CodecConfig {
  const raw = {
    JSON_STRICT_FIELDS: env.JSON_STRICT_FIELDS || undefined,
    JSON_DUPLICATE_KEYS: env.JSON_DUPLICATE_KEYS || undefined,
    JSON_DUPLICATE_ELEMENTS: env.JSON_DUPLICATE_ELEMENTS || undefined,
    JSON_MAX_DEPTH: env.JSON_MAX_DEPTH || undefined,
    JSON_LOG_LEVEL: env.JSON_LOG_LEVEL || undefined,
  };

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid codec configuration: ${problems}`);
  }

  return {
    strictFields: result.data.JSON_STRICT_FIELDS,
    duplicateKeys: result.data.JSON_DUPLICATE_KEYS,
    duplicateElements: result.data.JSON_DUPLICATE_ELEMENTS,
    maxDepth: result.data.JSON_MAX_DEPTH,
    logLevel: result.data.JSON_LOG_LEVEL,
  };
}

let cachedConfig: CodecConfig | null = null;

/**
 * Reset cached configuration (useful for testing)
 * @internal
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get codec configuration
 *
 * @example
 * ```ts
 * import { getConfig } from './config.js';
 *
 * if (!getConfig().strictFields) {
 *   console.log('Unknown keys will be skipped');
 * }
 * ```
 */
export function getConfig(): CodecConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export default getConfig;
