#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import chalk from 'chalk';
import { runCli } from './cli/run.js';

loadEnv({ override: false });

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.stack ?? err.message : String(err);
    console.error(chalk.red(`Fatal error: ${msg}`));
    process.exitCode = 1;
  });
