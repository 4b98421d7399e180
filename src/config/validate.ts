// src/config/validate.ts
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ArgsSchema, ConfigSchema, ConversionRegistrySchema } from './schema.js';
import type { Config } from '../types.js';

/**
 * Format Zod validation errors into a compact, readable multi-line string.
 */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      const base = `${path}: ${issue.message}`;
      if (issue.code === 'invalid_enum_value' && issue.options.length) {
        return `${base} (allowed: ${issue.options.join(', ')})`;
      }
      return base;
    })
    .join('\n');
}

function check<O, I>(schema: ZodType<O, ZodTypeDef, I>, raw: unknown, what: string): O {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${what}\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validate a raw argument vector. Returns a private copy.
 */
export function validateArgs(raw: unknown): string[] {
  return check(ArgsSchema, raw, 'arguments');
}

/**
 * Validate the shape of a conversion registry supplied at runtime.
 * Entries are checked but not copied; the caller's registry is used as given.
 */
export function validateRegistry(raw: unknown): void {
  check(ConversionRegistrySchema, raw, 'conversion registry');
}

/**
 * Validate a raw config object against the schema and return the typed result.
 * Throws an Error with a pretty message on failure.
 */
export function validateConfig(raw: unknown): Config {
  return check(ConfigSchema, raw, 'configuration');
}
