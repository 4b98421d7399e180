// src/config.ts
import type { Config } from './types.js';
import { loadDotEnvIfPresent } from './config/dotenv.js';
import { asBool, asLogLevel } from './config/parsers.js';
import { validateConfig } from './config/validate.js';
export { printOptions } from './config/printer.js';

/**
 * Build and return the demo program's runtime configuration.
 * Values come from `env`, after an optional `.env` in `dir` has been merged into it.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env, dir = process.cwd()): Config {
  loadDotEnvIfPresent(env, dir);

  const raw = {
    logLevel: asLogLevel(env.LOG_LEVEL),
    logJson: asBool('LOG_JSON', env.LOG_JSON, env.NODE_ENV === 'production'),
  };

  return validateConfig(raw);
}
