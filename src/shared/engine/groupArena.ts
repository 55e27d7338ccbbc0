import { CellId, PlayerIndex } from '../types/game';
import { EngineErrorCode, InvalidState } from './errors';

/**
 * Per-cell relationship between a group and the board.
 *
 * Values are bit flags so that two groups can be unioned with a bitwise OR;
 * {@link normalizeStatus} then keeps the dominant flag.
 */
export enum CellStatus {
  Empty = 0,
  Liberty = 1,
  EnemyAdjacent = 2,
  Member = 4,
}

export function normalizeStatus(flags: number): CellStatus {
  if (flags & CellStatus.Member) return CellStatus.Member;
  if (flags & CellStatus.EnemyAdjacent) return CellStatus.EnemyAdjacent;
  if (flags & CellStatus.Liberty) return CellStatus.Liberty;
  return CellStatus.Empty;
}

/**
 * A maximal connected set of same-controller tiles, stored as a status tag
 * for every cell of the board.
 */
export class Group {
  readonly tags: Uint8Array;
  extendable = true;

  constructor(cellCount: number, tags?: Uint8Array) {
    this.tags = tags ? Uint8Array.from(tags) : new Uint8Array(cellCount);
  }

  get cellCount(): number {
    return this.tags.length;
  }

  status(cell: CellId): CellStatus {
    return normalizeStatus(this.tags[cell]);
  }

  mark(cell: CellId, status: CellStatus): void {
    this.tags[cell] = status;
  }

  /** Fold `other` into this group. Member dominates EnemyAdjacent dominates Liberty. */
  union(other: Group): void {
    for (let cell = 0; cell < this.tags.length; cell++) {
      this.tags[cell] = normalizeStatus(this.tags[cell] | other.tags[cell]);
    }
  }

  libertyCount(): number {
    return this.count(CellStatus.Liberty);
  }

  memberCount(): number {
    return this.count(CellStatus.Member);
  }

  members(): CellId[] {
    return this.cellsWith(CellStatus.Member);
  }

  liberties(): CellId[] {
    return this.cellsWith(CellStatus.Liberty);
  }

  enemyAdjacentCells(): CellId[] {
    return this.cellsWith(CellStatus.EnemyAdjacent);
  }

  hasEnemyAdjacent(): boolean {
    return this.tags.some((tag) => normalizeStatus(tag) === CellStatus.EnemyAdjacent);
  }

  refreshExtendable(): boolean {
    this.extendable = !this.hasEnemyAdjacent();
    return this.extendable;
  }

  clone(): Group {
    const copy = new Group(this.tags.length, this.tags);
    copy.extendable = this.extendable;
    return copy;
  }

  private count(status: CellStatus): number {
    let n = 0;
    for (const tag of this.tags) {
      if (normalizeStatus(tag) === status) n++;
    }
    return n;
  }

  private cellsWith(status: CellStatus): CellId[] {
    const cells: CellId[] = [];
    this.tags.forEach((tag, cell) => {
      if (normalizeStatus(tag) === status) cells.push(cell);
    });
    return cells;
  }
}

// =============================================================================
// HANDLES
// =============================================================================

/**
 * Compact reference to an arena slot: `(index << 2) | (owner << 1) | valid`.
 * `0` is invalid and ownerless so a zeroed index array means "no group".
 */
export type GroupHandle = number;

export const NO_GROUP: GroupHandle = 0;

export function encodeHandle(index: number, owner: PlayerIndex): GroupHandle {
  return (index << 2) | (owner << 1) | 1;
}

export function isValidHandle(handle: GroupHandle): boolean {
  return (handle & 1) === 1;
}

export function handleOwner(handle: GroupHandle): PlayerIndex {
  return (handle & 2) !== 0 ? 1 : 0;
}

export function handleIndex(handle: GroupHandle): number {
  return handle >>> 2;
}

// =============================================================================
// ARENA
// =============================================================================

/**
 * Fixed-capacity store of one player's groups.
 *
 * Slots are allocated by a monotonic cursor and never reused within a game;
 * removal only marks a slot dead. The capacity bounds the groups the player
 * can ever hold (see `arenaCapacities`), and a slot is only allocated for a
 * placement with no friendly neighbour, so the cursor cannot overflow.
 */
export class GroupArena {
  readonly owner: PlayerIndex;
  readonly capacity: number;
  private readonly slots: Array<Group | undefined>;
  private cursor = 0;

  constructor(owner: PlayerIndex, capacity: number) {
    this.owner = owner;
    this.capacity = capacity;
    this.slots = new Array<Group | undefined>(capacity).fill(undefined);
  }

  get allocated(): number {
    return this.cursor;
  }

  insert(group: Group): GroupHandle {
    if (this.cursor >= this.capacity) {
      throw new InvalidState(
        EngineErrorCode.STATE_ARENA_EXHAUSTED,
        `Group arena for player ${this.owner} is exhausted`,
        { owner: this.owner, capacity: this.capacity },
        'GroupArena'
      );
    }
    const index = this.cursor++;
    this.slots[index] = group;
    return encodeHandle(index, this.owner);
  }

  get(handle: GroupHandle): Group | undefined {
    const index = this.slotIndex(handle);
    return index === undefined ? undefined : this.slots[index];
  }

  /** Like {@link get}, but a stale handle is a fatal inconsistency. */
  require(handle: GroupHandle, context: Record<string, unknown> = {}): Group {
    const group = this.get(handle);
    if (!group) {
      throw new InvalidState(
        EngineErrorCode.STATE_STALE_GROUP_HANDLE,
        `Handle ${handle} does not refer to a live group of player ${this.owner}`,
        { handle, owner: this.owner, ...context },
        'GroupArena'
      );
    }
    return group;
  }

  remove(handle: GroupHandle): Group | undefined {
    const index = this.slotIndex(handle);
    if (index === undefined) return undefined;
    const group = this.slots[index];
    this.slots[index] = undefined;
    return group;
  }

  liveHandles(): GroupHandle[] {
    const handles: GroupHandle[] = [];
    for (let index = 0; index < this.cursor; index++) {
      if (this.slots[index]) handles.push(encodeHandle(index, this.owner));
    }
    return handles;
  }

  liveGroups(): Array<{ handle: GroupHandle; group: Group }> {
    return this.liveHandles().map((handle) => ({ handle, group: this.require(handle) }));
  }

  clone(): GroupArena {
    const copy = new GroupArena(this.owner, this.capacity);
    copy.cursor = this.cursor;
    this.slots.forEach((group, index) => {
      copy.slots[index] = group?.clone();
    });
    return copy;
  }

  private slotIndex(handle: GroupHandle): number | undefined {
    if (!isValidHandle(handle) || handleOwner(handle) !== this.owner) return undefined;
    const index = handleIndex(handle);
    return index < this.cursor ? index : undefined;
  }
}
