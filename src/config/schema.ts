// src/config/schema.ts
import { z } from 'zod';

const fn = z.custom<(...args: never[]) => unknown>((v) => typeof v === 'function', {
  message: 'Expected function',
});

// Runtime validation schemas (Zod)
export const ArgsSchema = z.array(z.string());

export const ConversionEntrySchema = z
  .object({
    convert: fn,
    format: fn.optional(),
    presence: z.literal(true).optional(),
  })
  .passthrough()
  .refine((e) => 'defaultValue' in e, {
    message: 'Required',
    path: ['defaultValue'],
  });

export const ConversionRegistrySchema = z
  .record(z.string(), ConversionEntrySchema)
  .refine((r) => Object.keys(r).length > 0, { message: 'registry has no kinds' });

const LogLevelEnum = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  logLevel: LogLevelEnum,
  logJson: z.boolean(),
});
