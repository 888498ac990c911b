#!/usr/bin/env node

/**
 * ora-compat-audit executable entry point
 *
 * @module ora-compat-audit/cli
 */

import { config } from 'dotenv';
import { runCli } from './program.js';

config();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
