#!/usr/bin/env node
/**
 * CLI entry point for Test Data Forge
 */

import { runCli } from './program.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
