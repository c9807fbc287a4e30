#!/usr/bin/env node
import process from 'node:process';

import { runPlanformCli } from './commands.js';

const [, , ...argv] = process.argv;

runPlanformCli(argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
