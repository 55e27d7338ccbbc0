/**
 * Seeded random self-play over the hexlink engine.
 *
 * Both seats pick uniformly among the current legal placements and pass only
 * when none remain, so every game runs until the board is exhausted. With
 * `verify` on, the engine rebuilds its group state from the board after every
 * move and throws on any disagreement.
 */

import { z } from 'zod';
import { MAX_BOARD_RADIUS, MIN_BOARD_RADIUS, PlayerIndex } from '../shared/types/game';
import { EngineErrorCode, wrapEngineError } from '../shared/engine/errors';
import { GameEngine } from '../shared/engine/GameEngine';
import { formatPass, formatPlacement } from '../shared/engine/notation';
import { config } from './config';
import { logger } from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════
// Options
// ═══════════════════════════════════════════════════════════════════════════

export const SelfPlayOptionsSchema = z.object({
  radius: z.number().int().min(MIN_BOARD_RADIUS).max(MAX_BOARD_RADIUS),
  games: z.number().int().min(1),
  seed: z.number().int().nonnegative(),
  verify: z.boolean(),
  verbose: z.boolean(),
  outputPath: z.string().min(1).optional(),
});

export type SelfPlayOptions = z.infer<typeof SelfPlayOptionsSchema>;

export type ParsedArgs =
  | { kind: 'run'; options: SelfPlayOptions }
  | { kind: 'help' }
  | { kind: 'invalid'; errors: string[] };

export const USAGE = `
Hexlink Self-Play

Usage: hexlink-selfplay [options]

Options:
  --radius=N     Board radius (${MIN_BOARD_RADIUS}-${MAX_BOARD_RADIUS})
  --games=N      Number of games to play (default: 1)
  --seed=N       RNG seed
  --verify       Rebuild and compare group state after every move
  --verbose      Log every move
  --output=PATH  Write the JSON summary to PATH
  --help         Show this help
`;

/**
 * Parse `--key=value` style arguments on top of `defaults`.
 */
export function parseArgs(args: string[], defaults: SelfPlayOptions): ParsedArgs {
  const raw: Record<string, unknown> = { ...defaults };
  const errors: string[] = [];

  for (const arg of args) {
    if (arg.startsWith('--radius=')) {
      raw.radius = Number(arg.slice('--radius='.length));
    } else if (arg.startsWith('--games=')) {
      raw.games = Number(arg.slice('--games='.length));
    } else if (arg.startsWith('--seed=')) {
      raw.seed = Number(arg.slice('--seed='.length));
    } else if (arg === '--verify') {
      raw.verify = true;
    } else if (arg === '--verbose') {
      raw.verbose = true;
    } else if (arg.startsWith('--output=')) {
      raw.outputPath = arg.slice('--output='.length);
    } else if (arg === '--help') {
      return { kind: 'help' };
    } else {
      errors.push(`Unknown argument: ${arg}`);
    }
  }

  const parsed = SelfPlayOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(`--${issue.path.join('.')}: ${issue.message}`);
    }
  }
  if (errors.length > 0 || !parsed.success) {
    return { kind: 'invalid', errors };
  }
  return { kind: 'run', options: parsed.data };
}

// ═══════════════════════════════════════════════════════════════════════════
// Seeded RNG
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Linear congruential generator returning values in [0, 1).
 */
export function makeRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Game Loop
// ═══════════════════════════════════════════════════════════════════════════

export interface GameRecord {
  game: number;
  placements: number;
  passes: number;
  captures: number;
  selfCaptures: number;
  controlled: [number, number];
  winner: PlayerIndex | null;
  transcript?: string[];
}

export interface GameFailure {
  game: number;
  code: EngineErrorCode;
  message: string;
  context: Record<string, unknown>;
}

export interface SelfPlaySummary {
  /** Version of the tool that produced the summary. */
  version: string;
  radius: number;
  seed: number;
  games: number;
  wins: [number, number];
  draws: number;
  totalPlacements: number;
  totalCaptures: number;
  totalSelfCaptures: number;
  records: GameRecord[];
  failures: GameFailure[];
}

/**
 * Play one game to completion. Engine errors propagate to the caller.
 */
export function playGame(
  game: number,
  rng: () => number,
  options: Pick<SelfPlayOptions, 'radius' | 'verify' | 'verbose'>
): GameRecord {
  const engine = GameEngine.create({ radius: options.radius, verifyGroups: options.verify });
  const record: GameRecord = {
    game,
    placements: 0,
    passes: 0,
    captures: 0,
    selfCaptures: 0,
    controlled: [0, 0],
    winner: null,
  };
  const transcript: string[] = [];

  while (!engine.isGameOver()) {
    const player = engine.getCurrentPlayer();
    const legal = engine.getLegalMoves().toArray();

    if (legal.length === 0) {
      const result = engine.pass(player);
      if (result.type !== 'PASS_APPLIED') {
        throw new Error(`Pass declined for player ${player}: ${describeDecline(result)}`);
      }
      record.passes++;
      transcript.push(formatPass(player));
      continue;
    }

    const choice = legal[Math.floor(rng() * legal.length)];
    const result = engine.play({ player, cell: choice.cell, connections: choice.connections });
    if (result.type !== 'MOVE_APPLIED') {
      throw new Error(`Legal move declined for player ${player}: ${describeDecline(result)}`);
    }

    record.placements++;
    record.captures += result.capturedGroups;
    if (result.selfCaptured) record.selfCaptures++;

    const line = formatPlacement(player, result.position, result.connections, options.radius);
    transcript.push(line);
    if (options.verbose) {
      logger.info(line, {
        game,
        moveNumber: result.moveNumber,
        capturedGroups: result.capturedGroups,
        selfCaptured: result.selfCaptured,
      });
    }
  }

  const score = engine.getScore();
  record.controlled = score.controlled;
  record.winner = score.winner;
  if (options.verbose) record.transcript = transcript;
  return record;
}

function describeDecline(result: { type: string; reason?: string }): string {
  return result.reason ?? result.type;
}

/**
 * Run `options.games` games from a single seeded RNG. A game that raises an
 * engine error is recorded as a failure and the run moves on to the next.
 */
export function runSelfPlay(options: SelfPlayOptions): SelfPlaySummary {
  const rng = makeRng(options.seed);
  const summary: SelfPlaySummary = {
    version: config.app.version,
    radius: options.radius,
    seed: options.seed,
    games: options.games,
    wins: [0, 0],
    draws: 0,
    totalPlacements: 0,
    totalCaptures: 0,
    totalSelfCaptures: 0,
    records: [],
    failures: [],
  };

  logger.info('Starting self-play', {
    version: config.app.version,
    radius: options.radius,
    games: options.games,
    seed: options.seed,
    verify: options.verify,
  });

  for (let game = 1; game <= options.games; game++) {
    try {
      const record = playGame(game, rng, options);
      summary.records.push(record);
      summary.totalPlacements += record.placements;
      summary.totalCaptures += record.captures;
      summary.totalSelfCaptures += record.selfCaptures;
      if (record.winner === null) summary.draws++;
      else summary.wins[record.winner]++;

      logger.info('Game finished', {
        game,
        placements: record.placements,
        controlled: record.controlled,
        winner: record.winner,
      });
    } catch (err) {
      const error = wrapEngineError(err, 'SelfPlay', { game });
      summary.failures.push({
        game,
        code: error.code,
        message: error.message,
        context: error.context,
      });
      logger.error('Self-play game failed', { game, error: error.toJSON() });
    }
  }

  logger.info('Self-play complete', {
    games: options.games,
    wins: summary.wins,
    draws: summary.draws,
    failures: summary.failures.length,
  });

  return summary;
}
