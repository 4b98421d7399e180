// src/demo.ts
import { createParser } from './parser/parser.js';
import { printOptions } from './config.js';
import { getLogger } from './utils/logger.js';
import type { UsageSink } from './types.js';

export const DEMO_TITLE = 'typed-argv demo';

/**
 * Parses the demo flags from `argv` (element 0 is the script path) and writes either
 * the usage text (`-h`) or the resolved values as JSON to `out`.
 *
 * @returns Process exit status.
 */
export function runDemo(argv: readonly string[], out: UsageSink = process.stdout): number {
  const clp = createParser(argv);

  const image = clp.parse('string', '-img', 'default', 'Image to show');
  const poly = clp.parse('bool', '-poly', false, 'Use polynomial interpolation');
  const scale = clp.parse('float', '-scale', 1, 'Scale factor');
  const passes = clp.parse('int', '-n', 1, 'Number of passes');
  const help = clp.parse('bool', '-h', false, 'Print this help');

  printOptions(clp.options);

  if (help) {
    clp.usage(DEMO_TITLE, out);
    return 0;
  }

  getLogger('demo').info(`[demo] resolved ${clp.options.length} options`);
  out.write(JSON.stringify({ image, poly, scale, passes }, null, 2) + '\n');
  return 0;
}
