#!/usr/bin/env node
/**
 * hexlink-selfplay entry point.
 *
 * Usage:
 *   hexlink-selfplay --radius=3 --games=20 --seed=7 --verify --output=results/selfplay.json
 */

import fs from 'fs';
import path from 'path';
import { config } from './config';
import { USAGE, parseArgs, runSelfPlay } from './selfPlay';
import { logger } from './utils/logger';

function main(): number {
  const parsed = parseArgs(process.argv.slice(2), {
    radius: config.game.radius,
    games: 1,
    seed: config.selfPlay.seed,
    verify: config.game.verifyGroups,
    verbose: false,
  });

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'invalid') {
    for (const error of parsed.errors) console.error(error);
    console.error(USAGE);
    return 2;
  }

  const { options } = parsed;
  if (config.game.debugResolution) {
    logger.debug('Resolution tracing enabled (HEXLINK_DEBUG_RESOLUTION)');
  }

  const summary = runSelfPlay(options);

  if (options.outputPath) {
    const outputPath = path.resolve(options.outputPath);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(summary, null, 2));
    logger.info('Wrote self-play summary', { path: outputPath });
  } else {
    console.log(
      JSON.stringify(
        {
          version: summary.version,
          radius: summary.radius,
          seed: summary.seed,
          games: summary.games,
          wins: summary.wins,
          draws: summary.draws,
          totalPlacements: summary.totalPlacements,
          totalCaptures: summary.totalCaptures,
          totalSelfCaptures: summary.totalSelfCaptures,
          failures: summary.failures,
        },
        null,
        2
      )
    );
  }

  return summary.failures.length > 0 ? 1 : 0;
}

process.exitCode = main();
