import {
  CellId,
  DEFAULT_BOARD_RADIUS,
  PlacementRequest,
  PlayerIndex,
  Position,
  Tile,
  opponentOf,
} from '../types/game';
import { isGroupVerificationEnabled } from '../utils/envFlags';
import { GameSnapshot, GameSnapshotSchema } from '../validation/schemas';
import { Board } from './board';
import { EngineErrorCode, InvalidState } from './errors';
import { EngineState } from './engineState';
import {
  GroupDescription,
  arenaCapacities,
  describePartition,
  findEdgeMismatches,
  rebuildEngineState,
  verifyEngineState,
} from './groupReconstruction';
import { applyMove } from './groupResolution';
import { Hand } from './hand';
import { LegalMoveSet, regenerateLegalMoves } from './legalMoves';
import { ScoreSummary, computeScore } from './scoring';
import { isPlayableConnections, makeTile } from './tile';

export interface GameOptions {
  radius?: number;
  /** Connection masks each player starts with; defaults to the full set of 63. */
  hands?: [number[], number[]];
  firstPlayer?: PlayerIndex;
  /** Rebuild and compare group state after every move; defaults to HEXLINK_VERIFY_GROUPS. */
  verifyGroups?: boolean;
}

export type MoveResult =
  | {
      type: 'MOVE_APPLIED';
      player: PlayerIndex;
      moveNumber: number;
      cell: CellId;
      position: Required<Position>;
      connections: number;
      capturedGroups: number;
      selfCaptured: boolean;
      mutatedCells: CellId[];
      gameOver: boolean;
    }
  | {
      type: 'PASS_APPLIED';
      player: PlayerIndex;
      moveNumber: number;
      gameOver: boolean;
    }
  | {
      type: 'MOVE_DECLINED';
      code: EngineErrorCode;
      reason: string;
    };

function declined(code: EngineErrorCode, reason: string): MoveResult {
  return { type: 'MOVE_DECLINED', code, reason };
}

/**
 * Game orchestrator: turn order, passes, the cached legal-move set and the
 * single entry point into the resolution engine.
 *
 * Declined moves come back as `MOVE_DECLINED` results and leave the game
 * untouched. Internal consistency failures are thrown and never converted
 * into a result.
 */
export class GameEngine {
  private state: EngineState;
  private readonly hands: [Hand, Hand];
  private currentPlayer: PlayerIndex;
  private passCount: number;
  private moveNumber: number;
  private legalMoves: LegalMoveSet | undefined;
  private readonly verifyGroups: boolean;

  private constructor(
    state: EngineState,
    hands: [Hand, Hand],
    currentPlayer: PlayerIndex,
    passCount: number,
    moveNumber: number,
    verifyGroups: boolean
  ) {
    this.state = state;
    this.hands = hands;
    this.currentPlayer = currentPlayer;
    this.passCount = passCount;
    this.moveNumber = moveNumber;
    this.verifyGroups = verifyGroups;
  }

  static create(options: GameOptions = {}): GameEngine {
    const board = new Board(options.radius ?? DEFAULT_BOARD_RADIUS);
    const hands: [Hand, Hand] = options.hands
      ? [new Hand(0, options.hands[0]), new Hand(1, options.hands[1])]
      : [Hand.full(0), Hand.full(1)];
    const state = rebuildEngineState(board, arenaCapacities(board, [hands[0].size, hands[1].size]));
    return new GameEngine(
      state,
      hands,
      options.firstPlayer ?? 0,
      0,
      1,
      options.verifyGroups ?? isGroupVerificationEnabled()
    );
  }

  /**
   * Restore a game from a persisted snapshot. Group arenas and the index are
   * rebuilt from the board.
   */
  static fromSnapshot(raw: unknown, options: Pick<GameOptions, 'verifyGroups'> = {}): GameEngine {
    const parsed = GameSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_SNAPSHOT,
        'Game snapshot failed validation',
        {
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
        'GameEngine'
      );
    }

    const snapshot = parsed.data;
    const board = new Board(snapshot.radius, snapshot.cells);
    const mismatched = findEdgeMismatches(board);
    if (mismatched.length > 0) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_SNAPSHOT,
        'Game snapshot has tiles whose connections do not match their neighbours',
        { cells: mismatched },
        'GameEngine'
      );
    }
    const hands: [Hand, Hand] = [new Hand(0, snapshot.hands[0]), new Hand(1, snapshot.hands[1])];
    const state = rebuildEngineState(board, arenaCapacities(board, [hands[0].size, hands[1].size]));
    const sealed = state.arenas
      .flatMap((arena) => arena.liveGroups())
      .filter(({ group }) => group.libertyCount() === 0)
      .map(({ group }) => group.members());
    if (sealed.length > 0) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_SNAPSHOT,
        'Game snapshot has groups without liberties',
        { groups: sealed },
        'GameEngine'
      );
    }
    const engine = new GameEngine(
      state,
      hands,
      snapshot.currentPlayer,
      snapshot.passCount,
      snapshot.moveNumber,
      options.verifyGroups ?? isGroupVerificationEnabled()
    );
    if (engine.verifyGroups) verifyEngineState(state);
    return engine;
  }

  getCurrentPlayer(): PlayerIndex {
    return this.currentPlayer;
  }

  getMoveNumber(): number {
    return this.moveNumber;
  }

  getPassCount(): number {
    return this.passCount;
  }

  getRadius(): number {
    return this.state.board.radius;
  }

  isGameOver(): boolean {
    return this.passCount >= 2;
  }

  getTile(cell: CellId): Tile {
    return this.state.board.get(cell);
  }

  cellAt(pos: Position): CellId | undefined {
    return this.state.board.cellAt(pos);
  }

  positionOf(cell: CellId): Required<Position> {
    return this.state.board.positionOf(cell);
  }

  /** A copy of the board; mutating it does not affect the game. */
  getBoard(): Board {
    return this.state.board.clone();
  }

  getHand(player: PlayerIndex): number[] {
    return this.hands[player].masks();
  }

  /** Legal placements for the player to move, regenerated after every state change. */
  getLegalMoves(): LegalMoveSet {
    if (this.isGameOver()) return new LegalMoveSet();
    if (!this.legalMoves) {
      this.legalMoves = regenerateLegalMoves(
        this.state,
        this.currentPlayer,
        this.hands[this.currentPlayer]
      );
    }
    return this.legalMoves;
  }

  getGroups(player: PlayerIndex): GroupDescription[] {
    return describePartition(this.state, player);
  }

  getScore(): ScoreSummary {
    return computeScore(this.state.board);
  }

  play(request: PlacementRequest): MoveResult {
    const { player, connections } = request;
    if (this.isGameOver()) {
      return declined(EngineErrorCode.RULES_GAME_OVER, 'The game has already ended');
    }
    if (player !== this.currentPlayer) {
      return declined(
        EngineErrorCode.RULES_NOT_YOUR_TURN,
        `It is player ${this.currentPlayer}'s turn, not player ${player}'s`
      );
    }

    const cell = this.resolveCell(request);
    if (cell === undefined) {
      return declined(EngineErrorCode.RULES_ILLEGAL_PLACEMENT, 'Placement target is not on the board');
    }
    if (!isPlayableConnections(connections) || !this.hands[player].has(connections)) {
      return declined(
        EngineErrorCode.RULES_TILE_NOT_IN_HAND,
        `Player ${player} has no tile with connections ${connections}`
      );
    }
    if (!this.getLegalMoves().has(cell, connections)) {
      return declined(
        EngineErrorCode.RULES_ILLEGAL_PLACEMENT,
        `Connections ${connections} may not be placed at cell ${cell}`
      );
    }

    const moveNumber = this.moveNumber;
    const { state, outcome } = applyMove(
      this.state,
      { cell, tile: makeTile(connections, player) },
      { moveNumber }
    );
    if (this.verifyGroups) verifyEngineState(state);

    this.state = state;
    this.hands[player].withdraw(connections);
    this.passCount = 0;
    this.advanceTurn();

    return {
      type: 'MOVE_APPLIED',
      player,
      moveNumber,
      cell,
      position: state.board.positionOf(cell),
      connections,
      capturedGroups: outcome.capturedGroups,
      selfCaptured: outcome.selfCaptured,
      mutatedCells: outcome.mutatedCells,
      gameOver: false,
    };
  }

  pass(player: PlayerIndex): MoveResult {
    if (this.isGameOver()) {
      return declined(EngineErrorCode.RULES_GAME_OVER, 'The game has already ended');
    }
    if (player !== this.currentPlayer) {
      return declined(
        EngineErrorCode.RULES_NOT_YOUR_TURN,
        `It is player ${this.currentPlayer}'s turn, not player ${player}'s`
      );
    }

    const moveNumber = this.moveNumber;
    this.passCount++;
    this.advanceTurn();
    return { type: 'PASS_APPLIED', player, moveNumber, gameOver: this.isGameOver() };
  }

  snapshot(): GameSnapshot {
    return {
      radius: this.state.board.radius,
      cells: this.state.board.toArray(),
      hands: [this.hands[0].masks(), this.hands[1].masks()],
      currentPlayer: this.currentPlayer,
      passCount: this.passCount,
      moveNumber: this.moveNumber,
    };
  }

  private advanceTurn(): void {
    this.moveNumber++;
    this.currentPlayer = opponentOf(this.currentPlayer);
    this.legalMoves = undefined;
  }

  private resolveCell(request: PlacementRequest): CellId | undefined {
    if (request.cell !== undefined) {
      const { cell } = request;
      return Number.isInteger(cell) && cell >= 0 && cell < this.state.board.cellCount
        ? cell
        : undefined;
    }
    return request.position ? this.state.board.cellAt(request.position) : undefined;
  }
}
