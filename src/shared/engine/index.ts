/**
 * Public surface of the hexlink rules engine.
 *
 * Hosts normally drive a game through {@link GameEngine}; the lower layers
 * (board, arenas, resolution, legal moves) are exported for tools and tests
 * that work on engine state directly.
 */

export * from '../types/game';
export * from './errors';
export * from './tile';
export { Board, getBoardTopology, cellCountForRadius, isOnHexBoard } from './board';
export type { BoardTopology } from './board';
export {
  CellStatus,
  Group,
  GroupArena,
  NO_GROUP,
  encodeHandle,
  handleIndex,
  handleOwner,
  isValidHandle,
  normalizeStatus,
} from './groupArena';
export type { GroupHandle } from './groupArena';
export { cloneEngineState, createEngineState, groupAt } from './engineState';
export type { EngineState } from './engineState';
export { applyMove, resolvePlacement } from './groupResolution';
export type { ResolutionContext, ResolutionOutcome } from './groupResolution';
export {
  LegalMoveSet,
  candidateCells,
  edgeConstraints,
  matchesEdges,
  regenerateLegalMoves,
  wouldOscillate,
} from './legalMoves';
export {
  arenaCapacities,
  describePartition,
  findEdgeMismatches,
  rebuildEngineState,
  verifyEngineState,
} from './groupReconstruction';
export type { GroupDescription } from './groupReconstruction';
export { Hand } from './hand';
export { computeScore } from './scoring';
export type { ScoreSummary } from './scoring';
export {
  describeConnections,
  formatConnections,
  formatPass,
  formatPlacement,
  formatPosition,
} from './notation';
export { GameEngine } from './GameEngine';
export type { GameOptions, MoveResult } from './GameEngine';
export { GameSnapshotSchema } from '../validation/schemas';
export type { GameSnapshot } from '../validation/schemas';
