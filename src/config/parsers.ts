// src/config/parsers.ts
import type { LogLevel } from '../types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export function stripInlineComment(raw: string): string {
  let v = raw;
  const hashPos = v.indexOf('#');
  const semiPos = v.indexOf(';');
  let cutPos = -1;
  if (hashPos !== -1) cutPos = hashPos;
  if (semiPos !== -1 && (cutPos === -1 || semiPos < cutPos)) cutPos = semiPos;
  if (cutPos !== -1) v = v.slice(0, cutPos);
  return v.trim();
}

export function unquote(raw: string): string {
  const isSingleQuoted = raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'");
  const isDoubleQuoted = raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"');
  return isSingleQuoted || isDoubleQuoted ? raw.slice(1, -1) : raw;
}

export function asBool(name: string, v: unknown, def = false): boolean {
  if (v === undefined || v === null || v === '') return def;
  if (typeof v === 'boolean') return v;
  const s = stripInlineComment(unquote(String(v).trim()).trim()).toLowerCase();

  if (s === '1' || s === 'true' || s === 'yes' || s === 'y' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'n' || s === 'off') return false;

  throw new Error(`Option ${name} must be a boolean-like value, got "${String(v)}"`);
}

export function asLogLevel(v: unknown, def: LogLevel = 'info'): LogLevel {
  if (v === undefined || v === null || v === '') return def;
  const s = String(v).trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === s) ?? def;
}
