// src/parser/usage.ts
import type { RecordedOption } from '../types.js';

/**
 * Strips everything up to the last `/` or `\` from an invocation path.
 *
 * @example
 * programName('/usr/bin/tool');        // 'tool'
 * programName('C:\\bin\\tool.exe');    // 'tool.exe'
 */
export function programName(invocation: string): string {
  const cut = Math.max(invocation.lastIndexOf('/'), invocation.lastIndexOf('\\'));
  return invocation.slice(cut + 1);
}

/**
 * Renders usage text: the title, the program followed by every bracketed option name,
 * then one indented line per option with its help text.
 * Default values are not shown.
 */
export function renderUsage(title: string, invocation: string, options: readonly RecordedOption[]): string {
  const names = options.map((o) => `[${o.name}]`);
  const lines = [title, [programName(invocation), ...names].join(' ')];
  for (const o of options) lines.push(`\t [${o.name}]\t\t ${o.details}`);
  return lines.join('\n') + '\n';
}
