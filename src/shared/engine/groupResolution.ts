import { CellId, PlacementMove, PlayerIndex, opponentOf } from '../types/game';
import { debugLog, isResolutionDebugEnabled } from '../utils/envFlags';
import { EngineErrorCode, InvalidState } from './errors';
import { EngineState, cloneEngineState, indexGroup } from './engineState';
import { CellStatus, Group, GroupArena, GroupHandle, NO_GROUP } from './groupArena';
import {
  NO_TILE,
  connectedSides,
  connectionMask,
  flipController,
  tileController,
} from './tile';

/**
 * Group Resolution Engine.
 *
 * Given a placement the legal move generator has already accepted, updates
 * the board, both group arenas and the cell → handle index so that the
 * partition of tiles into connected same-controller groups matches the board
 * again: friendly merges, captures (with the friendly groups a capture newly
 * connects) and self-capture.
 *
 * The resolver never declines a move. Anything it cannot reconcile is an
 * {@link InvalidState}: a stale handle, an exhausted arena, or a structure
 * left without liberties under both controllers (oscillation).
 */

export interface ResolutionContext {
  /** Number of the move being resolved; used for diagnostics only. */
  moveNumber: number;
  /** Emit trace lines; defaults to HEXLINK_DEBUG_RESOLUTION. */
  debug?: boolean;
}

export interface ResolutionOutcome {
  cell: CellId;
  mover: PlayerIndex;
  moveNumber: number;
  /** Enemy groups that reached zero liberties and were flipped. */
  capturedGroups: number;
  /** Cells (other than the placed one) whose controller changed, ascending. */
  flippedCells: CellId[];
  /** The mover's own structure was flipped to the opponent. */
  selfCaptured: boolean;
  /** Placed cell plus flipped cells, ascending. */
  mutatedCells: CellId[];
  /** Group holding the placed cell after resolution, `NO_GROUP` when oscillated. */
  resultHandle: GroupHandle;
  oscillated: boolean;
  /** The liberty-less structure, only present when the placement oscillated. */
  deadStructure?: Group;
}

function pushUnique(list: GroupHandle[], handle: GroupHandle): void {
  if (!list.includes(handle)) list.push(handle);
}

function removeLive(
  arena: GroupArena,
  handle: GroupHandle,
  context: Record<string, unknown>
): Group {
  const group = arena.require(handle, context);
  arena.remove(handle);
  return group;
}

/**
 * Resolve `move` directly on `state`. Callers that need atomicity should use
 * {@link applyMove}, which resolves on a scratch copy.
 */
export function resolvePlacement(
  state: EngineState,
  move: PlacementMove,
  context: ResolutionContext
): ResolutionOutcome {
  const { board, groupIndex } = state;
  const { cell, tile } = move;
  const { moveNumber } = context;
  const debug = context.debug ?? isResolutionDebugEnabled();
  const trace = `[resolve #${moveNumber}]`;

  if (board.get(cell) !== NO_TILE) {
    throw new InvalidState(
      EngineErrorCode.STATE_CELL_OCCUPIED,
      `Cell ${cell} is already occupied`,
      { cell, moveNumber },
      'GroupResolution'
    );
  }

  const mover = tileController(tile);
  const rival = opponentOf(mover);
  const moverArena = state.arenas[mover];
  const rivalArena = state.arenas[rival];
  const flipCounts = new Map<CellId, number>();
  const flip = (target: CellId): void => {
    board.set(target, flipController(board.get(target)));
    flipCounts.set(target, (flipCounts.get(target) ?? 0) + 1);
  };

  board.set(cell, tile);

  // 1. Classify neighbours reached through connected sides.
  const newLiberties: CellId[] = [];
  const newEnemyEdges: CellId[] = [];
  const friendly: GroupHandle[] = [];
  const enemy: GroupHandle[] = [];
  for (const side of connectedSides(connectionMask(tile))) {
    const neighbor = board.neighbor(cell, side);
    if (neighbor === undefined) continue;
    const neighborTile = board.get(neighbor);
    if (neighborTile === NO_TILE) {
      newLiberties.push(neighbor);
    } else if (tileController(neighborTile) === mover) {
      pushUnique(friendly, groupIndex[neighbor]);
    } else {
      newEnemyEdges.push(neighbor);
      pushUnique(enemy, groupIndex[neighbor]);
    }
  }
  debugLog(debug, trace, 'cell', cell, 'friendly', friendly, 'enemy', enemy);

  // 2. Union friendly groups into the first one, or start a fresh group.
  let activeHandle: GroupHandle;
  let active: Group;
  if (friendly.length === 0) {
    active = new Group(board.cellCount);
    activeHandle = moverArena.insert(active);
  } else {
    activeHandle = friendly[0];
    active = moverArena.require(activeHandle, { cell, moveNumber });
    for (const handle of friendly.slice(1)) {
      active.union(removeLive(moverArena, handle, { cell, moveNumber }));
    }
  }
  const absorbed = new Set<GroupHandle>([activeHandle, ...friendly]);
  active.mark(cell, CellStatus.Member);
  for (const liberty of newLiberties) active.mark(liberty, CellStatus.Liberty);
  for (const edge of newEnemyEdges) active.mark(edge, CellStatus.EnemyAdjacent);

  // 3. Capture every enemy group the placement left without liberties.
  let capturedGroups = 0;
  const touchedRival: GroupHandle[] = [];
  for (const handle of enemy) {
    const group = rivalArena.require(handle, { cell, moveNumber });
    group.mark(cell, CellStatus.EnemyAdjacent);
    if (group.libertyCount() > 0) {
      touchedRival.push(handle);
      continue;
    }

    rivalArena.remove(handle);
    capturedGroups++;
    for (const member of group.members()) flip(member);

    // The captured structure may bridge to friendly groups the new tile
    // does not touch directly.
    for (const edge of group.enemyAdjacentCells()) {
      if (edge === cell) continue;
      const bridged = groupIndex[edge];
      if (absorbed.has(bridged)) continue;
      absorbed.add(bridged);
      active.union(removeLive(moverArena, bridged, { cell, edge, moveNumber }));
    }
    active.union(group);
    debugLog(debug, trace, 'captured group', handle, 'members', group.members());
  }

  // 4. Self-capture when the active structure is still liberty-less, captures
  // included: the flip carries the captured cells back with it.
  let resultHandle = activeHandle;
  let resultGroup = active;
  let selfCaptured = false;
  if (active.libertyCount() === 0) {
    selfCaptured = true;
    moverArena.remove(activeHandle);
    for (const member of active.members()) flip(member);

    const rivals: GroupHandle[] = [];
    for (const edge of active.enemyAdjacentCells()) pushUnique(rivals, groupIndex[edge]);
    debugLog(debug, trace, 'self-capture into', rivals);

    if (rivals.length === 0) {
      return buildOutcome(cell, mover, moveNumber, capturedGroups, true, flipCounts, NO_GROUP, active);
    }

    const survivorHandle = rivals[0];
    const survivor = rivalArena.require(survivorHandle, { cell, moveNumber });
    for (const handle of rivals.slice(1)) {
      survivor.union(removeLive(rivalArena, handle, { cell, moveNumber }));
    }
    survivor.union(active);

    if (survivor.libertyCount() === 0) {
      return buildOutcome(
        cell,
        mover,
        moveNumber,
        capturedGroups,
        true,
        flipCounts,
        NO_GROUP,
        survivor
      );
    }
    resultHandle = survivorHandle;
    resultGroup = survivor;
  }

  // 5. Reindex and 6. recompute extendable on every group touched.
  indexGroup(state, resultHandle, resultGroup);
  resultGroup.refreshExtendable();
  for (const handle of touchedRival) {
    const group = rivalArena.get(handle);
    if (!group) continue; // merged into the survivor during self-capture
    indexGroup(state, handle, group);
    group.refreshExtendable();
  }

  return buildOutcome(
    cell,
    mover,
    moveNumber,
    capturedGroups,
    selfCaptured,
    flipCounts,
    resultHandle
  );
}

function buildOutcome(
  cell: CellId,
  mover: PlayerIndex,
  moveNumber: number,
  capturedGroups: number,
  selfCaptured: boolean,
  flipCounts: Map<CellId, number>,
  resultHandle: GroupHandle,
  deadStructure?: Group
): ResolutionOutcome {
  // A cell captured and then self-captured back flips twice and is unchanged.
  const flippedCells = Array.from(flipCounts.entries())
    .filter(([flipped, count]) => flipped !== cell && count % 2 === 1)
    .map(([flipped]) => flipped)
    .sort((a, b) => a - b);
  const mutatedCells = [cell, ...flippedCells].sort((a, b) => a - b);
  const outcome: ResolutionOutcome = {
    cell,
    mover,
    moveNumber,
    capturedGroups,
    flippedCells,
    selfCaptured,
    mutatedCells,
    resultHandle,
    oscillated: deadStructure !== undefined,
  };
  if (deadStructure) outcome.deadStructure = deadStructure;
  return outcome;
}

/**
 * Atomic placement: resolves on a scratch copy and returns it. The input
 * state is never modified, so a thrown error leaves nothing half-applied.
 */
export function applyMove(
  state: EngineState,
  move: PlacementMove,
  context: ResolutionContext
): { state: EngineState; outcome: ResolutionOutcome } {
  const scratch = cloneEngineState(state);
  const outcome = resolvePlacement(scratch, move, context);
  if (outcome.oscillated) {
    throw new InvalidState(
      EngineErrorCode.STATE_OSCILLATION,
      `Placement at cell ${move.cell} leaves a structure without liberties under either controller`,
      {
        cell: move.cell,
        moveNumber: context.moveNumber,
        members: outcome.deadStructure?.members() ?? [],
      },
      'GroupResolution'
    );
  }
  return { state: scratch, outcome };
}
