import { CellId, PLAYERS, PlayerIndex, SIDES, Tile } from '../types/game';
import { Board } from './board';
import { EngineErrorCode, InvalidState } from './errors';
import { EngineState, createEngineState, indexGroup } from './engineState';
import { CellStatus, Group } from './groupArena';
import {
  NO_TILE,
  connectedSides,
  connectionMask,
  isConnected,
  opposite,
  tileController,
} from './tile';

/**
 * Group partition derived from the board alone. Arenas and the cell → handle
 * index are never persisted; this is how a restored game gets them back, and
 * how the incremental bookkeeping is checked.
 */

export interface GroupDescription {
  members: CellId[];
  liberties: CellId[];
  enemyAdjacent: CellId[];
  extendable: boolean;
}

/**
 * Arena capacity per player: one slot for each tile the player controls on
 * the board (the most groups a rebuild can allocate) plus one for each tile
 * still in hand (the most isolated placements left).
 */
export function arenaCapacities(board: Board, handSizes: [number, number]): [number, number] {
  const controlled: [number, number] = [0, 0];
  for (const cell of board.occupiedCells()) controlled[tileController(board.get(cell))]++;
  return [controlled[0] + handSizes[0], controlled[1] + handSizes[1]];
}

function floodGroup(board: Board, start: CellId, seen: Uint8Array): Group {
  const controller = tileController(board.get(start));
  const group = new Group(board.cellCount);
  const queue: CellId[] = [start];
  seen[start] = 1;

  while (queue.length > 0) {
    const cell = queue.shift();
    if (cell === undefined) continue;
    group.mark(cell, CellStatus.Member);

    const tile: Tile = board.get(cell);
    for (const side of connectedSides(connectionMask(tile))) {
      const neighbor = board.neighbor(cell, side);
      if (neighbor === undefined) continue;
      const neighborTile = board.get(neighbor);
      if (neighborTile === NO_TILE) {
        if (group.status(neighbor) !== CellStatus.Member) group.mark(neighbor, CellStatus.Liberty);
      } else if (tileController(neighborTile) === controller) {
        if (!seen[neighbor]) {
          seen[neighbor] = 1;
          queue.push(neighbor);
        }
      } else {
        group.mark(neighbor, CellStatus.EnemyAdjacent);
      }
    }
  }

  group.refreshExtendable();
  return group;
}

/**
 * Cells whose tile connects towards the board edge, or whose connected status
 * on a side disagrees with the neighbouring tile's opposite side. Empty for
 * any board reached through legal play.
 */
export function findEdgeMismatches(board: Board): CellId[] {
  const mismatched: CellId[] = [];
  for (const cell of board.occupiedCells()) {
    const tile = board.get(cell);
    const bad = SIDES.some((side) => {
      const neighbor = board.neighbor(cell, side);
      if (neighbor === undefined) return isConnected(tile, side);
      const neighborTile = board.get(neighbor);
      if (neighborTile === NO_TILE) return false;
      return isConnected(tile, side) !== isConnected(neighborTile, opposite(side));
    });
    if (bad) mismatched.push(cell);
  }
  return mismatched;
}

/** Rebuild arenas and index for `board` by flood fill. The board is shared, not copied. */
export function rebuildEngineState(board: Board, capacities: [number, number]): EngineState {
  const state = createEngineState(board, capacities);
  const seen = new Uint8Array(board.cellCount);

  for (const cell of board.occupiedCells()) {
    if (seen[cell]) continue;
    const group = floodGroup(board, cell, seen);
    const handle = state.arenas[tileController(board.get(cell))].insert(group);
    indexGroup(state, handle, group);
  }

  return state;
}

/** Canonical description of a player's groups, ordered by lowest member cell. */
export function describePartition(state: EngineState, player: PlayerIndex): GroupDescription[] {
  return state.arenas[player]
    .liveGroups()
    .map(({ group }) => ({
      members: group.members(),
      liberties: group.liberties(),
      enemyAdjacent: group.enemyAdjacentCells(),
      extendable: group.extendable,
    }))
    .sort((a, b) => (a.members[0] ?? -1) - (b.members[0] ?? -1));
}

function inconsistent(message: string, context: Record<string, unknown>): InvalidState {
  return new InvalidState(
    EngineErrorCode.STATE_GROUP_INCONSISTENT,
    message,
    context,
    'GroupReconstruction'
  );
}

/**
 * Check the partition, liberty and index invariants of `state` against its
 * board. Throws on the first breach.
 */
export function verifyEngineState(state: EngineState): void {
  const { board } = state;
  const rebuilt = rebuildEngineState(board, [board.cellCount, board.cellCount]);

  for (const player of PLAYERS) {
    const expected = JSON.stringify(describePartition(rebuilt, player));
    const actual = JSON.stringify(describePartition(state, player));
    if (expected !== actual) {
      throw inconsistent(`Group partition of player ${player} does not match the board`, {
        player,
        expected,
        actual,
      });
    }

    for (const { handle, group } of state.arenas[player].liveGroups()) {
      if (group.libertyCount() === 0) {
        throw inconsistent(`Live group ${handle} of player ${player} has no liberties`, {
          player,
          handle,
          members: group.members(),
        });
      }
    }
  }

  for (const cell of board.occupiedCells()) {
    const controller = tileController(board.get(cell));
    const handle = state.groupIndex[cell];
    const group = state.arenas[controller].get(handle);
    if (!group || group.status(cell) !== CellStatus.Member) {
      throw inconsistent(`Index entry for cell ${cell} does not point at its group`, {
        cell,
        handle,
        controller,
      });
    }
  }
}
