// src/types.ts
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Runtime settings of the demo program, resolved from environment variables and `.env`.
 */
export type Config = {
  /** Logger verbosity. */
  logLevel: LogLevel;
  /** Emit JSON log lines instead of colored text. */
  logJson: boolean;
};

/**
 * One queried option, as kept in a parser's history.
 */
export type RecordedOption = {
  /** Exact flag token that was searched for, e.g. `-img`. */
  readonly name: string;
  /** Help text shown in usage. */
  readonly details: string;
  /** The default value rendered as text. Recorded but not printed by usage. */
  readonly defaultValueText: string;
};

/**
 * Anything usage text can be written to. `process.stdout` qualifies.
 */
export interface UsageSink {
  write(text: string): unknown;
}
