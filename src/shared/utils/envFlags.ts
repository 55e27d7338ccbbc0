// Shared helpers for reading environment flags from the engine. The engine
// itself has no logger dependency so it can be embedded in any host; hosts
// that want structured logs (the CLI) wire winston on their side.

// Type-safe process.env access that works in both Node and browser contexts
type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * When enabled, the orchestrator rebuilds the group partition from the board
 * after every move and compares it with the incrementally maintained one.
 */
export function isGroupVerificationEnabled(): boolean {
  return flagEnabled('HEXLINK_VERIFY_GROUPS');
}

/**
 * Trace output from the group resolution engine (neighbour classification,
 * merges, captures).
 */
export function isResolutionDebugEnabled(): boolean {
  return flagEnabled('HEXLINK_DEBUG_RESOLUTION');
}

/**
 * Debug logging wrapper. The wrapped console.log is only invoked if the
 * condition is true.
 *
 * @example
 * debugLog(isResolutionDebugEnabled(), 'captured group', handle);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
