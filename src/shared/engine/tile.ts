import { PlayerIndex, Side, SIDES, Tile } from '../types/game';
import { BoardConstraintViolation, EngineErrorCode } from './errors';

/**
 * Tile byte helpers.
 *
 * A tile packs its six connection bits, its owner and its controller into a
 * single byte so that a board is a plain `Uint8Array` and "empty" is `0`.
 * Every function here is pure.
 */

export const NO_TILE: Tile = 0;

export const CONNECTION_MASK = 0x3f;
export const OWNER_BIT = 1 << 6;
export const CONTROLLER_BIT = 1 << 7;

export function opposite(side: Side): Side {
  return (side + 3) % 6;
}

export function isPlayableConnections(mask: number): boolean {
  return Number.isInteger(mask) && mask >= 1 && mask <= CONNECTION_MASK;
}

export function makeTile(
  connections: number,
  owner: PlayerIndex,
  controller: PlayerIndex = owner
): Tile {
  if (!isPlayableConnections(connections)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_CONNECTIONS,
      `Connection mask ${connections} is not a playable tile`,
      { connections }
    );
  }
  return connections | (owner === 1 ? OWNER_BIT : 0) | (controller === 1 ? CONTROLLER_BIT : 0);
}

export function isConnected(tile: Tile, side: Side): boolean {
  return (tile & (1 << side)) !== 0;
}

export function connectionMask(tile: Tile): number {
  return tile & CONNECTION_MASK;
}

export function tileOwner(tile: Tile): PlayerIndex {
  return (tile & OWNER_BIT) !== 0 ? 1 : 0;
}

export function tileController(tile: Tile): PlayerIndex {
  return (tile & CONTROLLER_BIT) !== 0 ? 1 : 0;
}

/** Toggle the controller bit only; owner and connections are preserved. */
export function flipController(tile: Tile): Tile {
  return tile ^ CONTROLLER_BIT;
}

export function connectedSides(mask: number): Side[] {
  return SIDES.filter((side) => (mask & (1 << side)) !== 0);
}

/** All playable masks in ascending order, `1 .. 63`. */
export function allPlayableMasks(): number[] {
  const masks: number[] = [];
  for (let mask = 1; mask <= CONNECTION_MASK; mask++) {
    masks.push(mask);
  }
  return masks;
}
