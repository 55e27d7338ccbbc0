/**
 * Engine Domain Errors - Structured error types for the hexlink rules engine
 *
 * Error Categories:
 * - **RulesViolation**: a placement or pass the rules do not allow. These are
 *   the "declined move" class: recoverable, and raised before any mutation.
 * - **InvalidState**: the engine's own bookkeeping is inconsistent (stale group
 *   handle, arena exhaustion, oscillation surviving resolution). These are
 *   fatal and indicate a bug upstream of the resolution engine.
 * - **BoardConstraintViolation**: geometry issues (unknown cell, bad radius,
 *   unplayable connection mask).
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_STALE_GROUP_HANDLE,
 *   'Group handle does not refer to a live group',
 *   { handle: 9, owner: 0 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: declined moves
 * - STATE_*: internal consistency failures
 * - BOARD_*: board geometry/topology issues
 * - INTERNAL_*: assertions
 */
export enum EngineErrorCode {
  // Rules Violations - declined moves, never mutate state
  /** Game has already concluded */
  RULES_GAME_OVER = 'RULES_GAME_OVER',
  /** Move submitted by the player who is not to move */
  RULES_NOT_YOUR_TURN = 'RULES_NOT_YOUR_TURN',
  /** Connection mask is not in the mover's hand */
  RULES_TILE_NOT_IN_HAND = 'RULES_TILE_NOT_IN_HAND',
  /** Placement is not in the current legal-move set */
  RULES_ILLEGAL_PLACEMENT = 'RULES_ILLEGAL_PLACEMENT',

  // State Errors - fatal, indicate a broken engine invariant
  /** Group handle is invalid, belongs to the other player, or its slot is dead */
  STATE_STALE_GROUP_HANDLE = 'STATE_STALE_GROUP_HANDLE',
  /** Group arena ran out of slots */
  STATE_ARENA_EXHAUSTED = 'STATE_ARENA_EXHAUSTED',
  /** A structure ended resolution with zero liberties under either controller */
  STATE_OSCILLATION = 'STATE_OSCILLATION',
  /** Target cell of a resolved placement is not empty */
  STATE_CELL_OCCUPIED = 'STATE_CELL_OCCUPIED',
  /** Incremental group state disagrees with the board */
  STATE_GROUP_INCONSISTENT = 'STATE_GROUP_INCONSISTENT',
  /** Persisted snapshot failed validation */
  STATE_INVALID_SNAPSHOT = 'STATE_INVALID_SNAPSHOT',

  // Board Constraint Violations - geometry/topology issues
  /** Board radius outside the supported range */
  BOARD_INVALID_RADIUS = 'BOARD_INVALID_RADIUS',
  /** Position or cell id is not on the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Connection mask is not a playable tile (must be 1..63) */
  BOARD_INVALID_CONNECTIONS = 'BOARD_INVALID_CONNECTIONS',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Declined move (game rule violation)',
  STATE_: 'Internal consistency failure',
  BOARD_: 'Board geometry/topology constraint violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'GroupResolution', 'GroupArena') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** True for errors that signal a broken engine invariant rather than a declined move */
  get isFatal(): boolean {
    return !this.code.startsWith('RULES_');
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for moves the rules do not allow.
 *
 * Examples:
 * - Tile withdrawn from a hand that no longer holds it
 * - Placement outside the current legal-move set
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for corrupted or inconsistent engine state.
 *
 * Thrown when the resolution engine detects that its own bookkeeping no
 * longer matches the board. This typically indicates either:
 * 1. A placement reached the resolution engine without passing the legal
 *    move generator
 * 2. A bug in group merging or reindexing
 *
 * Examples:
 * - Dereferencing a dead or foreign group handle
 * - A structure left with zero liberties after self-capture (oscillation)
 * - Arena cursor running past its capacity
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry/topology violations.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
