#!/usr/bin/env node
/**
 * tapdeck — CLI entrypoint
 */

import 'dotenv/config';
import { loadConfig } from '../config/index.js';
import { openDatabase } from '../db/connection.js';
import { runCli } from './program.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

process.exitCode = await runCli(process.argv.slice(2), {
  loadConfig,
  openDatabase,
  releaseDatabase: (db) => db.close(),
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  signal: controller.signal,
});
