import { CellId } from '../types/game';
import { Board } from './board';
import { Group, GroupArena, GroupHandle } from './groupArena';
import { NO_TILE, tileController } from './tile';

/**
 * Everything the resolution engine reads and writes: the board, one group
 * arena per player and the cell → handle index shared by both arenas.
 */
export interface EngineState {
  board: Board;
  arenas: [GroupArena, GroupArena];
  groupIndex: Uint16Array;
}

export function createEngineState(board: Board, capacities: [number, number]): EngineState {
  return {
    board,
    arenas: [new GroupArena(0, capacities[0]), new GroupArena(1, capacities[1])],
    groupIndex: new Uint16Array(board.cellCount),
  };
}

export function cloneEngineState(state: EngineState): EngineState {
  return {
    board: state.board.clone(),
    arenas: [state.arenas[0].clone(), state.arenas[1].clone()],
    groupIndex: Uint16Array.from(state.groupIndex),
  };
}

/**
 * The live group holding `cell`, or undefined for an empty cell. An occupied
 * cell whose handle does not resolve is a stale-handle failure.
 */
export function groupAt(
  state: EngineState,
  cell: CellId
): { handle: GroupHandle; group: Group } | undefined {
  const tile = state.board.get(cell);
  if (tile === NO_TILE) return undefined;
  const handle = state.groupIndex[cell];
  const controller = tileController(tile);
  const group = state.arenas[controller].require(handle, { cell });
  return { handle, group };
}

export function indexGroup(state: EngineState, handle: GroupHandle, group: Group): void {
  for (const cell of group.members()) {
    state.groupIndex[cell] = handle;
  }
}
