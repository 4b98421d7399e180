#!/usr/bin/env node
/**
 * Entry point for the typed-argv demo program.
 * Resolves logger configuration, then hands the script path and its arguments to the demo.
 */
// src/cli.ts
import { getConfig } from './config.js';
import { runDemo } from './demo.js';
import { getLogger, initLogger } from './utils/logger.js';

function main(): number {
  const cfg = getConfig();
  initLogger({ level: cfg.logLevel, json: cfg.logJson });
  return runDemo(process.argv.slice(1));
}

try {
  process.exitCode = main();
} catch (e) {
  const msg = e instanceof Error ? e.stack || e.message : String(e);
  getLogger('cli').error(msg);
  process.exitCode = 1;
}
