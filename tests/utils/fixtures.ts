/**
 * Test Fixtures and Utilities
 * Common boards and helpers for hexlink engine tests
 */

import { CellId, PlayerIndex, Position, Side } from '../../src/shared/types/game';
import { Board } from '../../src/shared/engine/board';
import { EngineState } from '../../src/shared/engine/engineState';
import { rebuildEngineState } from '../../src/shared/engine/groupReconstruction';
import { makeTile } from '../../src/shared/engine/tile';

/**
 * Position helper - creates a position object
 */
export function pos(x: number, y: number, z?: number): Position {
  return z !== undefined ? { x, y, z } : { x, y };
}

/**
 * Connection mask from a list of sides.
 */
export function sides(...connected: Side[]): number {
  return connected.reduce((mask, side) => mask | (1 << side), 0);
}

/**
 * Cell ids of the radius-1 board, named by their direction from the centre.
 *
 *        NW  NE
 *      W   C   E
 *        SW  SE
 */
export const R1 = {
  W: 0,
  SW: 1,
  NW: 2,
  C: 3,
  SE: 4,
  NE: 5,
  E: 6,
} as const;

export interface TestTile {
  cell: CellId;
  connections: number;
  owner: PlayerIndex;
  controller?: PlayerIndex;
}

/**
 * Creates a board of the given radius holding `tiles`.
 */
export function createTestBoard(radius: number, tiles: TestTile[] = []): Board {
  const board = new Board(radius);
  for (const tile of tiles) {
    board.set(tile.cell, makeTile(tile.connections, tile.owner, tile.controller ?? tile.owner));
  }
  return board;
}

/**
 * Creates an engine state for `tiles`, with arenas large enough for any
 * sequence of placements on the board.
 */
export function createTestState(radius: number, tiles: TestTile[] = []): EngineState {
  const board = createTestBoard(radius, tiles);
  return rebuildEngineState(board, [board.cellCount, board.cellCount]);
}
