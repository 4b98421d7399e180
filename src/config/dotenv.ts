// src/config/dotenv.ts
import fs from 'node:fs';
import path from 'node:path';
import { stripInlineComment, unquote } from './parsers.js';

/**
 * Parses `.env` text into key/value pairs.
 * - Supports both `KEY=VALUE` and `export KEY=VALUE` lines.
 * - Handles single/double quoted values.
 * - Strips inline comments (# or ;) for unquoted values.
 */
export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('export ')) line = line.slice('export '.length).trim();

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    const raw = line.slice(eq + 1).trim();
    const unquoted = unquote(raw);
    out[key] = unquoted !== raw ? unquoted : stripInlineComment(raw);
  }
  return out;
}

/**
 * Loads `.env` from `dir` into `env`, leaving variables that are already set alone.
 */
export function loadDotEnvIfPresent(env: NodeJS.ProcessEnv = process.env, dir = process.cwd()): void {
  const envPath = path.resolve(dir, '.env');
  if (!fs.existsSync(envPath)) return;
  const pairs = parseDotEnv(fs.readFileSync(envPath, 'utf8'));
  for (const [key, value] of Object.entries(pairs)) {
    if (!(key in env)) env[key] = value;
  }
}
