#!/usr/bin/env node
/**
 * @fileoverview answer-router CLI
 *
 * Commands:
 *   answer-router ask "<query>"   - Answer one query
 *   answer-router batch <file>    - Answer every query in a file
 *   answer-router cache <action>  - Cache stats, clear and sweep
 *   answer-router migrate         - Create or upgrade the cache database
 *
 * @packageDocumentation
 */

import { config as loadDotenv } from 'dotenv';
import { logError } from '../telemetry/logger.js';
import { runCli } from './program.js';

loadDotenv();

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

runCli(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError('[answer-router] unexpected failure', { error });
    process.exitCode = 1;
  }
);
