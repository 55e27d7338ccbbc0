import { PlayerIndex, Position, SIDES, SIDE_NAMES, playerLabel } from '../types/game';
import { connectedSides } from './tile';

/**
 * Shared notation helpers.
 *
 * A lightweight, human-readable notation for logs, traces and the self-play
 * CLI. It is not a full move grammar; parsing move text is left to hosts.
 */

/**
 * Format a cube position as file letter + rank.
 *
 * `y` picks the file ('a' at y = -radius) and `x` the rank, counted from the
 * bottom row (x = radius is rank 1).
 */
export function formatPosition(pos: Position, radius: number): string {
  const rankNum = radius - pos.x + 1;
  const file = String.fromCharCode('a'.charCodeAt(0) + (pos.y + radius));
  return `${file}${rankNum}`;
}

/** Six connection bits in side order (NE, E, SE, SW, W, NW), e.g. `110000`. */
export function formatConnections(mask: number): string {
  return SIDES.map((side) => ((mask & (1 << side)) !== 0 ? '1' : '0')).join('');
}

/** Names of the connected sides, e.g. `NE+E`; `-` for none. */
export function describeConnections(mask: number): string {
  const names = connectedSides(mask).map((side) => SIDE_NAMES[side]);
  return names.length > 0 ? names.join('+') : '-';
}

export function formatPlacement(
  player: PlayerIndex,
  pos: Position,
  connections: number,
  radius: number
): string {
  return `${playerLabel(player)} ${formatPosition(pos, radius)} ${formatConnections(connections)}`;
}

export function formatPass(player: PlayerIndex): string {
  return `${playerLabel(player)} pass`;
}
