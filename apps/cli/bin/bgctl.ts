#!/usr/bin/env tsx
/**
 * @bgctl/cli - Entry Point
 */

import chalk from 'chalk';
import { runCli } from '../src/index.js';

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: Error) => {
    console.error(chalk.red('Fatal:'), err.message);
    process.exitCode = 1;
  });
