#!/usr/bin/env node

/**
 * taskrun - Dice roll example
 *
 * Rolls the die a few times, one task per launch. Each launch receives the
 * previous launch's result, so scores accumulate in `retval`.
 *
 * Usage:
 *   npm run dice -- 5
 */

import dotenv from 'dotenv';
import { TaskExecutor, resolveLogLevel, type TaskResult } from '@taskrun/core';
import { DiceRoll } from './dice-roll-task.js';

dotenv.config();

function main(): number {
  const launches = Number.parseInt(process.argv[2] ?? '3', 10);
  const env = process.env.GAME_ENV ?? 'development';

  const executor = new TaskExecutor({ logLevel: resolveLogLevel() });
  executor.on('end', ({ status, result }) => {
    console.log(`${status}: ${result.stdout ?? result.stderr ?? ''}`);
  });

  let previous: TaskResult | undefined;
  for (let launchNumber = 1; launchNumber <= launches; launchNumber++) {
    const result = executor.execute(DiceRoll.create({ params: { launchNumber }, metadata: { env } }), {
      previous,
    });

    if (result.retcode !== 0) {
      return 1;
    }
    previous = result;
  }

  const total = Object.entries(previous?.retval ?? {})
    .filter(([key]) => key.startsWith('Score-'))
    .reduce((sum, [, value]) => sum + (typeof value === 'number' ? value : 0), 0);

  console.log(`Your score is ${total}`);
  return 0;
}

process.exitCode = main();
