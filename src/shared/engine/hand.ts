import { PlayerIndex, Tile } from '../types/game';
import { BoardConstraintViolation, EngineErrorCode, RulesViolation } from './errors';
import { allPlayableMasks, isPlayableConnections, makeTile } from './tile';

/**
 * The tiles a player may still place, identified by connection mask. A
 * standard hand holds one tile of every playable mask.
 */
export class Hand {
  readonly owner: PlayerIndex;
  private readonly remaining: Set<number>;

  constructor(owner: PlayerIndex, masks: Iterable<number>) {
    this.owner = owner;
    this.remaining = new Set<number>();
    for (const mask of masks) {
      if (!isPlayableConnections(mask)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_CONNECTIONS,
          `Hand for player ${owner} contains unplayable mask ${mask}`,
          { owner, mask }
        );
      }
      this.remaining.add(mask);
    }
  }

  static full(owner: PlayerIndex): Hand {
    return new Hand(owner, allPlayableMasks());
  }

  get size(): number {
    return this.remaining.size;
  }

  has(mask: number): boolean {
    return this.remaining.has(mask);
  }

  masks(): number[] {
    return Array.from(this.remaining).sort((a, b) => a - b);
  }

  /** Remove `mask` from the hand and return the tile, owned and controlled by the hand's owner. */
  withdraw(mask: number): Tile {
    if (!this.remaining.has(mask)) {
      throw new RulesViolation(
        EngineErrorCode.RULES_TILE_NOT_IN_HAND,
        `Player ${this.owner} has no tile with connections ${mask}`,
        { owner: this.owner, mask },
        'Hand'
      );
    }
    this.remaining.delete(mask);
    return makeTile(mask, this.owner);
  }

  clone(): Hand {
    return new Hand(this.owner, this.remaining);
  }
}
