import {
  CellId,
  MAX_BOARD_RADIUS,
  MIN_BOARD_RADIUS,
  Position,
  Side,
  SIDES,
  SIDE_DIRECTIONS,
  Tile,
  positionToString,
} from '../types/game';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import { NO_TILE } from './tile';

/**
 * Precomputed geometry for a hexagon of a given radius: the dense cell
 * enumeration and a 6-wide neighbour table (-1 for off-board).
 */
export interface BoardTopology {
  radius: number;
  cellCount: number;
  positions: ReadonlyArray<Required<Position>>;
  neighbors: Int16Array;
  cellByKey: ReadonlyMap<string, CellId>;
}

const topologyCache = new Map<number, BoardTopology>();

export function cellCountForRadius(radius: number): number {
  return 3 * radius * (radius + 1) + 1;
}

export function isOnHexBoard(pos: Position, radius: number): boolean {
  const z = typeof pos.z === 'number' ? pos.z : -pos.x - pos.y;
  if (pos.x + pos.y + z !== 0) return false;
  return Math.max(Math.abs(pos.x), Math.abs(pos.y), Math.abs(z)) <= radius;
}

export function getBoardTopology(radius: number): BoardTopology {
  const cached = topologyCache.get(radius);
  if (cached) return cached;

  if (!Number.isInteger(radius) || radius < MIN_BOARD_RADIUS || radius > MAX_BOARD_RADIUS) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_RADIUS,
      `Board radius must be an integer in ${MIN_BOARD_RADIUS}..${MAX_BOARD_RADIUS}`,
      { radius }
    );
  }

  const positions: Array<Required<Position>> = [];
  const cellByKey = new Map<string, CellId>();
  for (let x = -radius; x <= radius; x++) {
    for (let y = -radius; y <= radius; y++) {
      const z = -x - y;
      if (Math.abs(z) > radius) continue;
      const pos = { x, y, z };
      cellByKey.set(positionToString(pos), positions.length);
      positions.push(pos);
    }
  }

  const neighbors = new Int16Array(positions.length * SIDES.length).fill(-1);
  positions.forEach((pos, cell) => {
    for (const side of SIDES) {
      const dir = SIDE_DIRECTIONS[side];
      const key = positionToString({ x: pos.x + dir.x, y: pos.y + dir.y, z: pos.z + dir.z });
      const neighbor = cellByKey.get(key);
      if (neighbor !== undefined) {
        neighbors[cell * SIDES.length + side] = neighbor;
      }
    }
  });

  const topology: BoardTopology = {
    radius,
    cellCount: positions.length,
    positions,
    neighbors,
    cellByKey,
  };
  topologyCache.set(radius, topology);
  return topology;
}

/**
 * Fixed hexagonal board of tile bytes. Cell ids are dense and stable for a
 * given radius (x ascending, then y ascending).
 */
export class Board {
  readonly radius: number;
  readonly cellCount: number;
  private readonly topology: BoardTopology;
  private readonly cells: Uint8Array;

  constructor(radius: number, cells?: ArrayLike<number>) {
    this.topology = getBoardTopology(radius);
    this.radius = radius;
    this.cellCount = this.topology.cellCount;
    this.cells = new Uint8Array(this.cellCount);
    if (cells) {
      if (cells.length !== this.cellCount) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_POSITION,
          `Expected ${this.cellCount} cells for radius ${radius}, got ${cells.length}`,
          { radius, length: cells.length }
        );
      }
      this.cells.set(cells);
    }
  }

  get(cell: CellId): Tile {
    this.assertCell(cell);
    return this.cells[cell];
  }

  set(cell: CellId, tile: Tile): void {
    this.assertCell(cell);
    this.cells[cell] = tile;
  }

  isEmptyCell(cell: CellId): boolean {
    return this.get(cell) === NO_TILE;
  }

  /** Neighbour through `side`, or undefined when that side faces the board edge. */
  neighbor(cell: CellId, side: Side): CellId | undefined {
    this.assertCell(cell);
    const neighbor = this.topology.neighbors[cell * SIDES.length + side];
    return neighbor < 0 ? undefined : neighbor;
  }

  cellAt(pos: Position): CellId | undefined {
    if (!isOnHexBoard(pos, this.radius)) return undefined;
    return this.topology.cellByKey.get(positionToString(pos));
  }

  positionOf(cell: CellId): Required<Position> {
    this.assertCell(cell);
    return { ...this.topology.positions[cell] };
  }

  isEmpty(): boolean {
    return this.cells.every((tile) => tile === NO_TILE);
  }

  occupiedCells(): CellId[] {
    const occupied: CellId[] = [];
    this.cells.forEach((tile, cell) => {
      if (tile !== NO_TILE) occupied.push(cell);
    });
    return occupied;
  }

  toArray(): number[] {
    return Array.from(this.cells);
  }

  clone(): Board {
    return new Board(this.radius, this.cells);
  }

  private assertCell(cell: CellId): void {
    if (!Number.isInteger(cell) || cell < 0 || cell >= this.cellCount) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Cell ${cell} is not on a radius-${this.radius} board`,
        { cell, radius: this.radius }
      );
    }
  }
}
