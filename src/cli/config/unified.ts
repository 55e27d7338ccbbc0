/**
 * Unified CLI Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object for the self-play tooling.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { MAX_BOARD_RADIUS, MIN_BOARD_RADIUS } from '../../shared/types/game';
import { isTestEnvironment } from '../../shared/utils/envFlags';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  RawEnv,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';

// Skip in test mode so a local .env cannot override test-specific env vars.
if (!isTestEnvironment()) {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env: RawEnv =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

const nodeEnv = getEffectiveNodeEnv(env);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  app: z.object({
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().min(1).optional(),
  }),
  game: z.object({
    radius: z.number().int().min(MIN_BOARD_RADIUS).max(MAX_BOARD_RADIUS),
    verifyGroups: z.boolean(),
    debugResolution: z.boolean(),
  }),
  selfPlay: z.object({
    seed: z.number().int().nonnegative(),
  }),
});

/**
 * CLI configuration type inferred from the schema.
 */
export type CliConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  app: {
    version: env.npm_package_version ?? '0.1.0',
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  game: {
    radius: env.HEXLINK_BOARD_RADIUS,
    verifyGroups: env.HEXLINK_VERIFY_GROUPS,
    debugResolution: env.HEXLINK_DEBUG_RESOLUTION,
  },
  selfPlay: {
    seed: env.HEXLINK_SELFPLAY_SEED,
  },
};

export const config: CliConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
