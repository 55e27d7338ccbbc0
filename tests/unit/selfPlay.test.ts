import { config } from '../../src/cli/config';
import {
  SelfPlayOptions,
  makeRng,
  parseArgs,
  playGame,
  runSelfPlay,
} from '../../src/cli/selfPlay';

describe('selfPlay', () => {
  const defaults: SelfPlayOptions = {
    radius: 1,
    games: 1,
    seed: 42,
    verify: false,
    verbose: false,
  };

  describe('parseArgs', () => {
    it('applies flags over the defaults', () => {
      expect(
        parseArgs(['--radius=3', '--games=5', '--seed=7', '--verify', '--output=out.json'], defaults)
      ).toEqual({
        kind: 'run',
        options: {
          radius: 3,
          games: 5,
          seed: 7,
          verify: true,
          verbose: false,
          outputPath: 'out.json',
        },
      });
    });

    it('returns the defaults when no flags are given', () => {
      expect(parseArgs([], defaults)).toEqual({ kind: 'run', options: defaults });
    });

    it('recognises --help', () => {
      expect(parseArgs(['--verbose', '--help'], defaults)).toEqual({ kind: 'help' });
    });

    it('reports unknown arguments', () => {
      expect(parseArgs(['--bogus'], defaults)).toEqual({
        kind: 'invalid',
        errors: ['Unknown argument: --bogus'],
      });
    });

    it('reports out-of-range values by flag', () => {
      const parsed = parseArgs(['--radius=12', '--games=0'], defaults);
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') {
        expect(parsed.errors).toHaveLength(2);
        expect(parsed.errors[0]).toMatch(/^--radius: /);
        expect(parsed.errors[1]).toMatch(/^--games: /);
      }
    });
  });

  describe('makeRng', () => {
    it('is deterministic per seed and stays in [0, 1)', () => {
      const a = makeRng(7);
      const b = makeRng(7);
      const valuesA = Array.from({ length: 50 }, () => a());
      const valuesB = Array.from({ length: 50 }, () => b());

      expect(valuesA).toEqual(valuesB);
      for (const value of valuesA) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('steps a linear congruential generator', () => {
      const rng = makeRng(0);
      expect(rng()).toBe(1013904223 / 0x100000000);
    });
  });

  describe('playGame', () => {
    it('plays until two consecutive passes and records a transcript when verbose', () => {
      const record = playGame(1, makeRng(3), { radius: 1, verify: true, verbose: true });

      expect(record.placements).toBeGreaterThan(0);
      expect(record.passes).toBeGreaterThanOrEqual(2);
      expect(record.controlled[0] + record.controlled[1]).toBe(record.placements);
      expect(record.transcript).toHaveLength(record.placements + record.passes);
    });

    it('omits the transcript otherwise', () => {
      const record = playGame(1, makeRng(3), { radius: 1, verify: false, verbose: false });
      expect(record.transcript).toBeUndefined();
    });
  });

  describe('runSelfPlay', () => {
    const options: SelfPlayOptions = { radius: 1, games: 2, seed: 7, verify: true, verbose: false };

    it('plays every game without failures', () => {
      const summary = runSelfPlay(options);

      expect(summary.failures).toEqual([]);
      expect(summary.version).toBe(config.app.version);
      expect(summary.version).toMatch(/^\d+\.\d+\.\d+/);
      expect(summary.records.map((record) => record.game)).toEqual([1, 2]);
      expect(summary.wins[0] + summary.wins[1] + summary.draws).toBe(2);
      expect(summary.totalPlacements).toBe(
        summary.records[0].placements + summary.records[1].placements
      );
    });

    it('is reproducible from the seed', () => {
      expect(runSelfPlay(options)).toEqual(runSelfPlay(options));
    });
  });
});
