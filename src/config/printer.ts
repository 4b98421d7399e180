// src/config/printer.ts
import { getLogger } from '../utils/logger.js';
import type { RecordedOption } from '../types.js';

/**
 * Pretty-print the recorded options, defaults included, via logger at debug level.
 * Usage output leaves the defaults out, so this is the place to see them.
 */
export function printOptions(options: readonly RecordedOption[]): void {
  const view = Object.fromEntries(
    options.map((o) => [o.name, { details: o.details.trim() || '-', default: o.defaultValueText }]),
  );
  getLogger('config').debug('[options]\n' + JSON.stringify(view, null, 2));
}
