#!/usr/bin/env node

/**
 * taskrun - Hello example
 *
 * Usage:
 *   npm run hello -- "Ada Lovelace"
 *   TASKRUN_LOG_LEVEL=debug npm run hello
 */

import dotenv from 'dotenv';
import { TaskExecutor, resolveLogLevel } from '@taskrun/core';
import { Hello } from './hello-task.js';

dotenv.config();

function main(): number {
  const user = process.argv[2] ?? process.env.HELLO_USER ?? 'John Smith';

  const executor = new TaskExecutor({ logLevel: resolveLogLevel() });
  const task = Hello.create({ params: { user } });

  const result = executor.execute(task);

  console.log(JSON.stringify({ status: task.status, ...result }, null, 2));
  return result.retcode === 0 ? 0 : 1;
}

process.exitCode = main();
