/**
 * Environment Variable Schema and Validation
 *
 * Zod schema for every environment variable the hexlink CLI reads, with
 * defaults. Parsed once at startup by `unified.ts`.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { MAX_BOARD_RADIUS, MIN_BOARD_RADIUS } from '../../shared/types/game';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // GAME CONFIGURATION
  // ===================================================================

  /** Default board radius for new games */
  HEXLINK_BOARD_RADIUS: z.coerce
    .number()
    .int()
    .min(MIN_BOARD_RADIUS)
    .max(MAX_BOARD_RADIUS)
    .default(4),

  /** Default RNG seed for self-play */
  HEXLINK_SELFPLAY_SEED: z.coerce.number().int().min(0).default(42),

  /** Rebuild and compare group state after every move */
  HEXLINK_VERIFY_GROUPS: booleanFlag,

  /** Trace output from the group resolution engine */
  HEXLINK_DEBUG_RESOLUTION: booleanFlag,
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
