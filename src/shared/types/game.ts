/**
 * Players are addressed by index: 0 is player A (moves first by default),
 * 1 is player B. The index doubles as the value of the owner/controller bits
 * of a tile byte.
 */
export type PlayerIndex = 0 | 1;

export const PLAYERS: readonly PlayerIndex[] = [0, 1];

export const opponentOf = (player: PlayerIndex): PlayerIndex => (player === 0 ? 1 : 0);

export const playerLabel = (player: PlayerIndex): 'A' | 'B' => (player === 0 ? 'A' : 'B');

/**
 * The six sides of a hex cell, clockwise from north-east. A side's opposite
 * is always three steps further round, so `(side + 3) % 6`.
 */
export enum Side {
  NorthEast = 0,
  East = 1,
  SouthEast = 2,
  SouthWest = 3,
  West = 4,
  NorthWest = 5,
}

export const SIDES: readonly Side[] = [
  Side.NorthEast,
  Side.East,
  Side.SouthEast,
  Side.SouthWest,
  Side.West,
  Side.NorthWest,
];

export const SIDE_NAMES: Record<Side, string> = {
  [Side.NorthEast]: 'NE',
  [Side.East]: 'E',
  [Side.SouthEast]: 'SE',
  [Side.SouthWest]: 'SW',
  [Side.West]: 'W',
  [Side.NorthWest]: 'NW',
};

/**
 * Cube coordinates. `z` is optional on input and always equals `-x - y`.
 */
export interface Position {
  x: number;
  y: number;
  z?: number;
}

/**
 * Cube-coordinate step for each side, indexed by {@link Side}.
 */
export const SIDE_DIRECTIONS: Record<Side, Required<Position>> = {
  [Side.NorthEast]: { x: 1, y: -1, z: 0 },
  [Side.East]: { x: 1, y: 0, z: -1 },
  [Side.SouthEast]: { x: 0, y: 1, z: -1 },
  [Side.SouthWest]: { x: -1, y: 1, z: 0 },
  [Side.West]: { x: -1, y: 0, z: 1 },
  [Side.NorthWest]: { x: 0, y: -1, z: 1 },
};

/**
 * A tile byte. Bits 0-5 are the connection bits (bit n is side n), bit 6 is
 * the owner, bit 7 the controller. `0` means "no tile".
 */
export type Tile = number;

/** Dense cell id, `0 .. cellCount - 1`. */
export type CellId = number;

export const MIN_BOARD_RADIUS = 1;
export const MAX_BOARD_RADIUS = 8;
export const DEFAULT_BOARD_RADIUS = 4;

export const positionToString = (pos: Position): string => {
  const z = typeof pos.z === 'number' ? pos.z : -pos.x - pos.y;
  return `${pos.x},${pos.y},${z}`;
};

/**
 * A placement as handed to the resolution engine: the target cell and a tile
 * already withdrawn from the mover's hand (owner and controller set).
 */
export interface PlacementMove {
  cell: CellId;
  tile: Tile;
}

/**
 * A placement request as submitted by a caller of the orchestrator. Either a
 * position or a cell id addresses the target.
 */
export interface PlacementRequest {
  player: PlayerIndex;
  connections: number;
  position?: Position;
  cell?: CellId;
}
