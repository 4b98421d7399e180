// src/utils/logger.ts
import winston from 'winston';

const NPM_LEVELS = new Set(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

/**
 * Converts an arbitrary text value to a winston level.
 * Supports standard npm levels as well as aliases `trace` → `silly`, `log` → `info`.
 * `silent` is kept as-is and handled by the caller.
 *
 * @param l String representation of the level (may be undefined).
 */
function mapLevel(l?: string): string {
  const x = (l || '').toLowerCase();
  if (NPM_LEVELS.has(x) || x === 'silent') return x;
  if (x === 'trace') return 'silly';
  if (x === 'log') return 'info';
  return 'info';
}

type Env = 'development' | 'production' | 'test';

function currentEnv(): Env {
  const e = process.env.NODE_ENV;
  return e === 'production' || e === 'test' ? e : 'development';
}

const splatFormat = winston.format.splat();
const metadataFormat = winston.format.metadata({
  fillExcept: ['timestamp', 'level', 'message', 'label', 'stack'],
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: () => new Date().toISOString() }),
  winston.format.errors({ stack: true }),
);

const devFormat = winston.format.combine(
  baseFormat,
  splatFormat,
  metadataFormat,
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, label, metadata } = info;
    const metaObj = metadata && typeof metadata === 'object' ? metadata : {};
    const metaStr = Object.keys(metaObj).length ? ` ${JSON.stringify(metaObj)}` : '';
    const where = label ? `[${String(label)}]` : '';
    const line = stack ? `${String(message)}\n${String(stack)}` : String(message);
    return `${String(timestamp)} ${where} ${level}: ${line}${metaStr}`;
  }),
);

const prodFormat = winston.format.combine(baseFormat, splatFormat, metadataFormat, winston.format.json());

let root: winston.Logger | null = null;

export type LoggerOptions = { level?: string; json?: boolean };

/**
 * Creates the root logger with a console transport.
 * The default format depends on NODE_ENV: JSON in production, otherwise colored human-readable.
 * Under NODE_ENV=test, or with level `silent`, nothing is written.
 */
function buildRoot(options?: LoggerOptions): winston.Logger {
  const env = currentEnv();
  const level = mapLevel(options?.level ?? process.env.LOG_LEVEL);
  const useJson = options?.json ?? env === 'production';

  return winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    levels: winston.config.npm.levels,
    format: useJson ? prodFormat : devFormat,
    defaultMeta: { app: 'typed-argv', env },
    // stdout carries program output (usage, demo JSON)
    transports: [new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) })],
    silent: env === 'test' || level === 'silent',
  });
}

function ensureRoot(): winston.Logger {
  if (!root) root = buildRoot();
  return root;
}

/**
 * Initializes (or reinitializes) the root logger.
 * Call once at program start if you need to set level/format.
 */
export function initLogger(options?: LoggerOptions): winston.Logger {
  root = buildRoot(options);
  return root;
}

/**
 * Returns a child logger with the specified module label.
 * Children created before `initLogger` keep the old root's settings, so take them lazily.
 */
export function getLogger(label: string): winston.Logger {
  return ensureRoot().child({ label });
}
