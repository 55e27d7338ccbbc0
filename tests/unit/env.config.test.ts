/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation used by the CLI.
 */

import { EnvSchema, getEffectiveNodeEnv, parseEnv } from '../../src/cli/config/env';

describe('EnvSchema', () => {
  it('should apply defaults to an empty environment', () => {
    const result = parseEnv({});
    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'pretty',
      HEXLINK_BOARD_RADIUS: 4,
      HEXLINK_SELFPLAY_SEED: 42,
      HEXLINK_VERIFY_GROUPS: false,
      HEXLINK_DEBUG_RESOLUTION: false,
    });
  });

  it('should coerce numeric game settings', () => {
    const result = parseEnv({ HEXLINK_BOARD_RADIUS: '2', HEXLINK_SELFPLAY_SEED: '1234' });
    expect(result.data?.HEXLINK_BOARD_RADIUS).toBe(2);
    expect(result.data?.HEXLINK_SELFPLAY_SEED).toBe(1234);
  });

  it('should reject radii outside the supported range', () => {
    for (const radius of ['0', '9', '2.5']) {
      const result = parseEnv({ HEXLINK_BOARD_RADIUS: radius });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['HEXLINK_BOARD_RADIUS']);
    }
  });

  it('should reject unknown log levels and formats', () => {
    const result = parseEnv({ LOG_LEVEL: 'verbose', LOG_FORMAT: 'xml' });
    expect(result.success).toBe(false);
    expect(result.errors?.map((e) => e.path)).toEqual(['LOG_LEVEL', 'LOG_FORMAT']);
  });

  it('should read boolean flags from "true" or "1" only', () => {
    expect(parseEnv({ HEXLINK_VERIFY_GROUPS: 'true' }).data?.HEXLINK_VERIFY_GROUPS).toBe(true);
    expect(parseEnv({ HEXLINK_VERIFY_GROUPS: '1' }).data?.HEXLINK_VERIFY_GROUPS).toBe(true);
    expect(parseEnv({ HEXLINK_VERIFY_GROUPS: 'yes' }).data?.HEXLINK_VERIFY_GROUPS).toBe(false);
    expect(parseEnv({ HEXLINK_DEBUG_RESOLUTION: '0' }).data?.HEXLINK_DEBUG_RESOLUTION).toBe(false);
  });

  it('should drop variables it does not know', () => {
    const result = EnvSchema.safeParse({ PATH: '/usr/bin', LOG_FILE: 'logs/cli.log' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.LOG_FILE).toBe('logs/cli.log');
      expect(Object.keys(result.data)).not.toContain('PATH');
    }
  });
});

describe('getEffectiveNodeEnv', () => {
  it('should report test inside Jest regardless of NODE_ENV', () => {
    const result = EnvSchema.parse({ NODE_ENV: 'production' });
    expect(getEffectiveNodeEnv(result)).toBe('test');
  });
});
