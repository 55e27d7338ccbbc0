import { PlayerIndex } from '../types/game';
import { Board } from './board';
import { tileController } from './tile';

export interface ScoreSummary {
  /** Cells controlled by each player. */
  controlled: [number, number];
  /** Higher control wins; `null` on a draw. */
  winner: PlayerIndex | null;
}

export function computeScore(board: Board): ScoreSummary {
  const controlled: [number, number] = [0, 0];
  for (const cell of board.occupiedCells()) {
    controlled[tileController(board.get(cell))]++;
  }

  let winner: PlayerIndex | null = null;
  if (controlled[0] > controlled[1]) winner = 0;
  else if (controlled[1] > controlled[0]) winner = 1;

  return { controlled, winner };
}
