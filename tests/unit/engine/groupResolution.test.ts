import { Side } from '../../../src/shared/types/game';
import { EngineErrorCode, isInvalidState } from '../../../src/shared/engine/errors';
import { NO_GROUP, encodeHandle } from '../../../src/shared/engine/groupArena';
import { applyMove, resolvePlacement } from '../../../src/shared/engine/groupResolution';
import {
  describePartition,
  verifyEngineState,
} from '../../../src/shared/engine/groupReconstruction';
import { makeTile } from '../../../src/shared/engine/tile';
import { R1, createTestState, sides } from '../../utils/fixtures';

const ctx = { moveNumber: 1, debug: false };

describe('groupResolution', () => {
  describe('placement without contact', () => {
    it('starts a fresh group with the reached empty cells as liberties', () => {
      const state = createTestState(1);
      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.West), 0) },
        ctx
      );

      expect(outcome).toMatchObject({
        cell: R1.C,
        mover: 0,
        capturedGroups: 0,
        flippedCells: [],
        mutatedCells: [R1.C],
        selfCaptured: false,
        resultHandle: encodeHandle(0, 0),
        oscillated: false,
      });
      expect(describePartition(state, 0)).toEqual([
        { members: [R1.C], liberties: [R1.W, R1.E], enemyAdjacent: [], extendable: true },
      ]);
      expect(state.groupIndex[R1.C]).toBe(encodeHandle(0, 0));
      verifyEngineState(state);
    });
  });

  describe('friendly merge', () => {
    it('keeps the first friendly group slot and kills the rest', () => {
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.East), owner: 0 },
        { cell: R1.E, connections: sides(Side.West), owner: 0 },
      ]);
      const westHandle = encodeHandle(0, 0);
      const eastHandle = encodeHandle(1, 0);
      expect(state.groupIndex[R1.W]).toBe(westHandle);
      expect(state.groupIndex[R1.E]).toBe(eastHandle);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.SouthEast, Side.West), 0) },
        ctx
      );

      // East is reached first in side order, so its slot survives.
      expect(outcome.resultHandle).toBe(eastHandle);
      expect(state.arenas[0].get(westHandle)).toBeUndefined();
      expect(state.arenas[0].allocated).toBe(2);
      expect(describePartition(state, 0)).toEqual([
        {
          members: [R1.W, R1.C, R1.E],
          liberties: [R1.SE],
          enemyAdjacent: [],
          extendable: true,
        },
      ]);
      expect([R1.W, R1.C, R1.E].map((cell) => state.groupIndex[cell])).toEqual([
        eastHandle,
        eastHandle,
        eastHandle,
      ]);
      verifyEngineState(state);
    });
  });

  describe('enemy contact without capture', () => {
    it('marks both sides enemy-adjacent and clears extendable', () => {
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.NorthEast, Side.East), owner: 1 },
      ]);
      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.West), 0) },
        ctx
      );

      expect(outcome.capturedGroups).toBe(0);
      expect(outcome.selfCaptured).toBe(false);
      expect(describePartition(state, 0)).toEqual([
        { members: [R1.C], liberties: [R1.E], enemyAdjacent: [R1.W], extendable: false },
      ]);
      expect(describePartition(state, 1)).toEqual([
        { members: [R1.W], liberties: [R1.NW], enemyAdjacent: [R1.C], extendable: false },
      ]);
      verifyEngineState(state);
    });
  });

  describe('capture', () => {
    it('flips an enemy group whose last liberty is taken', () => {
      const state = createTestState(1, [{ cell: R1.W, connections: sides(Side.East), owner: 1 }]);
      const rivalHandle = encodeHandle(0, 1);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.West), 0) },
        ctx
      );

      expect(outcome).toMatchObject({
        capturedGroups: 1,
        flippedCells: [R1.W],
        mutatedCells: [R1.W, R1.C],
        selfCaptured: false,
        oscillated: false,
      });
      // Owner stays player 1; controller becomes player 0.
      expect(state.board.get(R1.W)).toBe(makeTile(sides(Side.East), 1, 0));
      expect(state.arenas[1].get(rivalHandle)).toBeUndefined();
      expect(describePartition(state, 0)).toEqual([
        { members: [R1.W, R1.C], liberties: [R1.E], enemyAdjacent: [], extendable: true },
      ]);
      expect(describePartition(state, 1)).toEqual([]);
      verifyEngineState(state);
    });

    it('captures every liberty-less enemy group in the same move', () => {
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.East), owner: 1 },
        { cell: R1.E, connections: sides(Side.West), owner: 1 },
      ]);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.SouthEast, Side.West), 0) },
        ctx
      );

      expect(outcome.capturedGroups).toBe(2);
      expect(outcome.flippedCells).toEqual([R1.W, R1.E]);
      expect(outcome.mutatedCells).toEqual([R1.W, R1.C, R1.E]);
      expect(describePartition(state, 0)).toEqual([
        {
          members: [R1.W, R1.C, R1.E],
          liberties: [R1.SE],
          enemyAdjacent: [],
          extendable: true,
        },
      ]);
      verifyEngineState(state);
    });

    it('absorbs friendly groups the captured group was touching', () => {
      // Player 1 at W touches player 0's tile at NW; the new tile at C only
      // reaches W, yet the capture joins NW into the result.
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.NorthEast, Side.East), owner: 1 },
        { cell: R1.NW, connections: sides(Side.SouthWest, Side.East), owner: 0 },
      ]);
      const bridgedHandle = encodeHandle(0, 0);
      expect(state.groupIndex[R1.NW]).toBe(bridgedHandle);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.SouthEast, Side.West), 0) },
        ctx
      );

      expect(outcome.capturedGroups).toBe(1);
      expect(outcome.flippedCells).toEqual([R1.W]);
      expect(outcome.resultHandle).toBe(encodeHandle(1, 0));
      expect(state.arenas[0].get(bridgedHandle)).toBeUndefined();
      expect(describePartition(state, 0)).toEqual([
        {
          members: [R1.W, R1.NW, R1.C],
          liberties: [R1.SE, R1.NE],
          enemyAdjacent: [],
          extendable: true,
        },
      ]);
      verifyEngineState(state);
    });
  });

  describe('self-capture', () => {
    it('flips a liberty-less placement into the enemy group it touches', () => {
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.NorthEast, Side.East), owner: 1 },
      ]);
      const rivalHandle = encodeHandle(0, 1);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.West), 0) },
        ctx
      );

      expect(outcome).toMatchObject({
        capturedGroups: 0,
        flippedCells: [],
        mutatedCells: [R1.C],
        selfCaptured: true,
        resultHandle: rivalHandle,
        oscillated: false,
      });
      expect(state.board.get(R1.C)).toBe(makeTile(sides(Side.West), 0, 1));
      expect(describePartition(state, 0)).toEqual([]);
      expect(describePartition(state, 1)).toEqual([
        { members: [R1.W, R1.C], liberties: [R1.NW], enemyAdjacent: [], extendable: true },
      ]);
      expect(state.groupIndex[R1.C]).toBe(rivalHandle);
      verifyEngineState(state);
    });

    it('hands a capture back when the merged structure stays sealed', () => {
      // W has only C as a liberty and is captured; E keeps NE, so the new
      // structure {W, C} self-captures into E's group.
      const state = createTestState(1, [
        { cell: R1.W, connections: sides(Side.East), owner: 1 },
        { cell: R1.E, connections: sides(Side.West, Side.NorthWest), owner: 1 },
      ]);
      const capturedHandle = encodeHandle(0, 1);
      const survivorHandle = encodeHandle(1, 1);

      const outcome = resolvePlacement(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.West), 0) },
        ctx
      );

      expect(outcome).toMatchObject({
        capturedGroups: 1,
        selfCaptured: true,
        // W flips to player 0 and back again.
        flippedCells: [],
        mutatedCells: [R1.C],
        resultHandle: survivorHandle,
        oscillated: false,
      });
      expect(state.board.get(R1.W)).toBe(makeTile(sides(Side.East), 1));
      expect(state.board.get(R1.C)).toBe(makeTile(sides(Side.East, Side.West), 0, 1));
      expect(state.arenas[1].get(capturedHandle)).toBeUndefined();
      expect(state.arenas[0].liveHandles()).toEqual([]);
      expect(describePartition(state, 1)).toEqual([
        {
          members: [R1.W, R1.C, R1.E],
          liberties: [R1.NE],
          enemyAdjacent: [],
          extendable: true,
        },
      ]);
      expect([R1.W, R1.C, R1.E].map((cell) => state.groupIndex[cell])).toEqual([
        survivorHandle,
        survivorHandle,
        survivorHandle,
      ]);
      verifyEngineState(state);
    });
  });

  describe('oscillation', () => {
    const oscillatingSetup = () =>
      createTestState(1, [{ cell: R1.W, connections: sides(Side.East), owner: 1 }]);
    const oscillatingMove = { cell: R1.C, tile: makeTile(sides(Side.West), 0) };

    it('reports a structure with no liberties under either controller', () => {
      const state = oscillatingSetup();
      const outcome = resolvePlacement(state, oscillatingMove, ctx);

      expect(outcome.oscillated).toBe(true);
      expect(outcome.resultHandle).toBe(NO_GROUP);
      expect(outcome.capturedGroups).toBe(1);
      expect(outcome.selfCaptured).toBe(true);
      // W is captured then flipped back, so only the placed cell changed.
      expect(outcome.flippedCells).toEqual([]);
      expect(outcome.deadStructure?.members()).toEqual([R1.W, R1.C]);
      expect(outcome.deadStructure?.libertyCount()).toBe(0);
    });

    it('applyMove throws STATE_OSCILLATION and leaves the input state untouched', () => {
      const state = oscillatingSetup();
      const before = state.board.toArray();

      let caught: unknown;
      try {
        applyMove(state, oscillatingMove, ctx);
      } catch (err) {
        caught = err;
      }

      expect(isInvalidState(caught)).toBe(true);
      if (isInvalidState(caught)) {
        expect(caught.code).toBe(EngineErrorCode.STATE_OSCILLATION);
        expect(caught.context).toEqual({ cell: R1.C, moveNumber: 1, members: [R1.W, R1.C] });
      }
      expect(state.board.toArray()).toEqual(before);
      expect(describePartition(state, 1)).toEqual([
        { members: [R1.W], liberties: [R1.C], enemyAdjacent: [], extendable: true },
      ]);
    });
  });

  describe('applyMove', () => {
    it('returns a new state and never mutates its input', () => {
      const state = createTestState(1, [{ cell: R1.W, connections: sides(Side.East), owner: 1 }]);
      const { state: next, outcome } = applyMove(
        state,
        { cell: R1.C, tile: makeTile(sides(Side.East, Side.West), 0) },
        ctx
      );

      expect(outcome.capturedGroups).toBe(1);
      expect(next.board.get(R1.C)).toBe(makeTile(sides(Side.East, Side.West), 0));
      expect(state.board.get(R1.C)).toBe(0);
      expect(state.board.get(R1.W)).toBe(makeTile(sides(Side.East), 1));
      expect(describePartition(state, 0)).toEqual([]);
    });

    it('rejects a placement on an occupied cell', () => {
      const state = createTestState(1, [{ cell: R1.C, connections: sides(Side.East), owner: 1 }]);
      let caught: unknown;
      try {
        applyMove(state, { cell: R1.C, tile: makeTile(1, 0) }, ctx);
      } catch (err) {
        caught = err;
      }
      expect(isInvalidState(caught)).toBe(true);
      if (isInvalidState(caught)) {
        expect(caught.code).toBe(EngineErrorCode.STATE_CELL_OCCUPIED);
      }
    });

    it('reports a stale index entry as a stale handle', () => {
      const state = createTestState(1, [{ cell: R1.W, connections: sides(Side.East), owner: 0 }]);
      state.groupIndex[R1.W] = encodeHandle(4, 0);
      let caught: unknown;
      try {
        applyMove(state, { cell: R1.C, tile: makeTile(sides(Side.West, Side.East), 0) }, ctx);
      } catch (err) {
        caught = err;
      }
      expect(isInvalidState(caught)).toBe(true);
      if (isInvalidState(caught)) {
        expect(caught.code).toBe(EngineErrorCode.STATE_STALE_GROUP_HANDLE);
      }
    });
  });
});
