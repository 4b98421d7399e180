// src/index.ts
export { ArgParser, createParser } from './parser/parser.js';
export { programName, renderUsage } from './parser/usage.js';
export { defaultConversions, formatValue } from './conversion/registry.js';
export type { ConversionEntry, ConversionRegistry, KindName, ValueKinds } from './conversion/registry.js';
export { formatFloat, toFloat, toInt } from './conversion/numeric.js';
export { ContractViolationError, UnsupportedKindError } from './errors.js';
export type { RecordedOption, UsageSink } from './types.js';
