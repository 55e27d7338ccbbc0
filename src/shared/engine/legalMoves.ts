import { CellId, PlayerIndex, SIDES, opponentOf } from '../types/game';
import { EngineState, groupAt } from './engineState';
import { CellStatus, Group, GroupHandle } from './groupArena';
import { Hand } from './hand';
import { NO_TILE, connectedSides, isConnected, opposite, tileController } from './tile';

/**
 * Legal placements for one player, keyed by cell.
 */
export class LegalMoveSet {
  private readonly byCell = new Map<CellId, ReadonlySet<number>>();

  add(cell: CellId, masks: number[]): void {
    if (masks.length > 0) this.byCell.set(cell, new Set(masks));
  }

  has(cell: CellId, connections: number): boolean {
    return this.byCell.get(cell)?.has(connections) ?? false;
  }

  masksAt(cell: CellId): number[] {
    return Array.from(this.byCell.get(cell) ?? []).sort((a, b) => a - b);
  }

  cells(): CellId[] {
    return Array.from(this.byCell.keys()).sort((a, b) => a - b);
  }

  get size(): number {
    let total = 0;
    for (const masks of this.byCell.values()) total += masks.size;
    return total;
  }

  isEmpty(): boolean {
    return this.byCell.size === 0;
  }

  toArray(): Array<{ cell: CellId; connections: number }> {
    return this.cells().flatMap((cell) =>
      this.masksAt(cell).map((connections) => ({ cell, connections }))
    );
  }
}

/**
 * Side constraints a cell imposes on any tile placed there, as a pair of
 * masks: `fixed` marks the sides that are constrained and `required` gives
 * the connection bit those sides must carry. Sides facing empty cells are
 * free; sides facing the edge must be disconnected.
 */
export function edgeConstraints(
  state: EngineState,
  cell: CellId
): { fixed: number; required: number } {
  let fixed = 0;
  let required = 0;
  for (const side of SIDES) {
    const neighbor = state.board.neighbor(cell, side);
    if (neighbor === undefined) {
      fixed |= 1 << side;
      continue;
    }
    const neighborTile = state.board.get(neighbor);
    if (neighborTile === NO_TILE) continue;
    fixed |= 1 << side;
    if (isConnected(neighborTile, opposite(side))) required |= 1 << side;
  }
  return { fixed, required };
}

export function matchesEdges(
  constraints: { fixed: number; required: number },
  connections: number
): boolean {
  return (connections & constraints.fixed) === constraints.required;
}

/**
 * Cells the mover may consider at all: every cell on an empty board,
 * otherwise empty cells touching an opponent tile on any side, plus the
 * liberties of the mover's extendable groups.
 */
export function candidateCells(state: EngineState, mover: PlayerIndex): CellId[] {
  const { board } = state;
  const candidates = new Set<CellId>();

  if (board.isEmpty()) {
    for (let cell = 0; cell < board.cellCount; cell++) candidates.add(cell);
    return Array.from(candidates);
  }

  const rival = opponentOf(mover);
  for (let cell = 0; cell < board.cellCount; cell++) {
    if (board.get(cell) !== NO_TILE) continue;
    for (const side of SIDES) {
      const neighbor = board.neighbor(cell, side);
      if (neighbor === undefined) continue;
      const neighborTile = board.get(neighbor);
      if (neighborTile !== NO_TILE && tileController(neighborTile) === rival) {
        candidates.add(cell);
        break;
      }
    }
  }

  for (const group of state.arenas[mover].liveGroups()) {
    if (!group.group.extendable) continue;
    for (const liberty of group.group.liberties()) candidates.add(liberty);
  }

  return Array.from(candidates).sort((a, b) => a - b);
}

/**
 * Predict, without mutating anything, whether placing `connections` at
 * `cell` for `mover` would leave a structure with no liberties under either
 * controller.
 *
 * Mirrors the resolver: the new tile joins the friendly groups it touches,
 * captures the enemy groups whose last liberty is `cell`, and through them
 * joins the friendly groups those captured groups touched. If that structure
 * has no liberty it self-captures, which only rescues it when something of
 * the opponent's borders it.
 */
export function wouldOscillate(
  state: EngineState,
  cell: CellId,
  connections: number,
  mover: PlayerIndex
): boolean {
  const { board } = state;
  const friendly = new Map<GroupHandle, Group>();
  const enemy = new Map<GroupHandle, Group>();
  let reachesEmpty = false;

  for (const side of connectedSides(connections)) {
    const neighbor = board.neighbor(cell, side);
    if (neighbor === undefined) continue;
    const entry = groupAt(state, neighbor);
    if (!entry) {
      reachesEmpty = true;
      continue;
    }
    if (tileController(board.get(neighbor)) === mover) friendly.set(entry.handle, entry.group);
    else enemy.set(entry.handle, entry.group);
  }
  if (reachesEmpty) return false;

  const captured = new Map<GroupHandle, Group>();
  for (const [handle, group] of enemy) {
    if (group.libertyCount() === 1 && group.status(cell) === CellStatus.Liberty) {
      captured.set(handle, group);
    } else {
      // A surviving enemy group borders the structure and absorbs the flip.
      return false;
    }
  }

  const capturedCells = new Set<CellId>();
  for (const group of captured.values()) {
    for (const member of group.members()) capturedCells.add(member);
    for (const edge of group.enemyAdjacentCells()) {
      if (edge === cell) continue;
      const entry = groupAt(state, edge);
      if (entry) friendly.set(entry.handle, entry.group);
    }
  }

  for (const group of friendly.values()) {
    for (const liberty of group.liberties()) {
      if (liberty !== cell) return false;
    }
  }

  for (const group of friendly.values()) {
    for (const edge of group.enemyAdjacentCells()) {
      if (!capturedCells.has(edge)) return false;
    }
  }

  return true;
}

/**
 * Enumerate every legal (cell, connections) placement for `mover` given the
 * masks still in their hand.
 */
export function regenerateLegalMoves(
  state: EngineState,
  mover: PlayerIndex,
  hand: Hand
): LegalMoveSet {
  const legal = new LegalMoveSet();
  const masks = hand.masks();
  if (masks.length === 0) return legal;

  for (const cell of candidateCells(state, mover)) {
    const constraints = edgeConstraints(state, cell);
    const fitting = masks.filter(
      (mask) => matchesEdges(constraints, mask) && !wouldOscillate(state, cell, mask, mover)
    );
    legal.add(cell, fitting);
  }

  return legal;
}
