#!/usr/bin/env node
import 'dotenv/config';
import { logger } from './core/logger.js';
import { runCli } from './runCli.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'lookalike crashed');
    process.exitCode = 1;
  }
);
