// src/parser/parser.ts
import type { Logger } from 'winston';
import { defaultConversions, formatValue } from '../conversion/registry.js';
import type { ConversionRegistry, KindName, ValueKinds } from '../conversion/registry.js';
import { validateArgs, validateRegistry } from '../config/validate.js';
import { ContractViolationError, UnsupportedKindError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import type { RecordedOption, UsageSink } from '../types.js';
import { renderUsage } from './usage.js';

/**
 * Extracts typed flag values from a process argument vector and remembers every query
 * so it can print a usage summary.
 *
 * `args[0]` is the invocation path and is never matched; flags and their value tokens follow.
 *
 * @example
 * ```ts
 * const clp = createParser(['prog', '-img', 'photo.png', '-poly']);
 * clp.parse('string', '-img', 'default', 'Image to show'); // 'photo.png'
 * clp.parse('bool', '-poly', false, 'Use interpolation');   // true
 * clp.usage('Demo');
 * ```
 */
export class ArgParser<M = ValueKinds> {
  private argv: readonly string[];
  private readonly recorded: RecordedOption[] = [];
  private readonly registry: ConversionRegistry<M>;
  private readonly log: Logger;

  constructor(args: readonly string[], registry: ConversionRegistry<M>) {
    validateRegistry(registry);
    this.argv = validateArgs(args);
    this.registry = registry;
    this.log = getLogger('parser');
  }

  /** The argument vector being scanned. */
  get args(): readonly string[] {
    return this.argv;
  }

  /** Every option queried so far, in call order. */
  get options(): readonly RecordedOption[] {
    return [...this.recorded];
  }

  /**
   * Replaces the argument vector and forgets all recorded options.
   */
  reset(args: readonly string[]): void {
    this.argv = validateArgs(args);
    this.recorded.length = 0;
  }

  /**
   * Looks up flag `name` and converts the token after it to the value type of `kind`.
   * Returns `defaultValue` (or the kind's own default) when the flag is absent.
   * Scanning stops at the first match.
   *
   * A flag given as the last argument has no value token: presence kinds such as `bool`
   * still convert, every other kind is treated as absent.
   *
   * Each call is recorded for usage, found or not.
   */
  parse<K extends KindName<M>>(kind: K, name: string, defaultValue?: M[K], details = ' '): M[K] {
    const entry = this.registry[kind];
    if (!entry) throw new UnsupportedKindError(kind, Object.keys(this.registry));

    const def: M[K] = defaultValue === undefined ? entry.defaultValue : defaultValue;
    let value: M[K] = def;
    let source = 'default';

    for (let i = 1; i < this.argv.length; i++) {
      if (this.argv[i] !== name) continue;
      if (i + 1 < this.argv.length) {
        value = entry.convert(this.argv[i + 1]);
        source = `argv[${i + 1}]`;
      } else if (entry.presence) {
        value = entry.convert('');
        source = 'presence';
      }
      break;
    }

    this.recorded.push({ name, details, defaultValueText: formatValue(entry, def) });
    this.log.debug(`[parse] ${kind} ${name} ← ${source}`);
    return value;
  }

  /**
   * Usage text as `usage` prints it.
   *
   * @throws ContractViolationError when there is no invocation path at `args[0]`.
   */
  formatUsage(title: string): string {
    if (this.argv.length === 0) {
      throw new ContractViolationError('usage requires the invocation path at args[0], but args is empty');
    }
    return renderUsage(title, this.argv[0], this.recorded);
  }

  /**
   * Writes usage text for all options queried so far. Nothing is written on failure.
   */
  usage(title: string, out: UsageSink = process.stdout): void {
    out.write(this.formatUsage(title));
  }
}

/**
 * Builds a parser over the built-in `int`, `float`, `string` and `bool` kinds,
 * or over a custom registry.
 */
export function createParser(args?: readonly string[]): ArgParser<ValueKinds>;
export function createParser<M>(args: readonly string[], registry: ConversionRegistry<M>): ArgParser<M>;
export function createParser<M>(
  args: readonly string[] = [],
  registry?: ConversionRegistry<M>,
): ArgParser<M> | ArgParser<ValueKinds> {
  return registry ? new ArgParser<M>(args, registry) : new ArgParser<ValueKinds>(args, defaultConversions);
}
