// src/conversion/registry.ts
import { formatFloat, toFloat, toInt } from './numeric.js';

/**
 * How one value kind is defaulted, converted from a command-line token and recorded.
 */
export interface ConversionEntry<T> {
  /** Value used when the caller passes no default. */
  readonly defaultValue: T;
  /** Converts the token that follows a flag. Never throws for bad input. */
  convert(token: string): T;
  /** Text stored in the option history for a default value. Falls back to `String(value)`. */
  format?(value: T): string;
  /** The flag alone implies the value, so a flag with no following token still converts. */
  readonly presence?: true;
}

/**
 * Built-in value kinds and the TypeScript type each one resolves to.
 * Extend it (`interface MyKinds extends ValueKinds { ... }`) to describe a custom registry.
 */
export interface ValueKinds {
  int: number;
  float: number;
  string: string;
  bool: boolean;
}

/** One conversion entry per kind of `M`. */
export type ConversionRegistry<M> = { readonly [K in keyof M]: ConversionEntry<M[K]> };

/** Kind names of a value map, restricted to strings. */
export type KindName<M> = keyof M & string;

const intEntry: ConversionEntry<number> = {
  defaultValue: 0,
  convert: toInt,
  format: (v) => String(v),
};

const floatEntry: ConversionEntry<number> = {
  defaultValue: 0,
  convert: toFloat,
  format: (v) => formatFloat(v),
};

const stringEntry: ConversionEntry<string> = {
  defaultValue: '',
  convert: (token) => token,
  format: (v) => v,
};

// Presence means true; the token is never inspected, so there is no explicit "false".
const boolEntry: ConversionEntry<boolean> = {
  defaultValue: false,
  convert: () => true,
  format: (v) => (v ? '1' : '0'),
  presence: true,
};

export const defaultConversions: ConversionRegistry<ValueKinds> = {
  int: intEntry,
  float: floatEntry,
  string: stringEntry,
  bool: boolEntry,
};

/**
 * Renders a value for the option history using the entry's own formatter when it has one.
 */
export function formatValue<T>(entry: ConversionEntry<T>, value: T): string {
  return entry.format ? entry.format(value) : String(value);
}
