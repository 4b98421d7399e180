// src/conversion/numeric.ts

const NON_FINITE_RE = /^\s*([+-]?)(inf(?:inity)?|nan)/i;

/**
 * Reads the leading base-10 integer of a token.
 * Leading whitespace and a sign are allowed; anything after the digits is ignored.
 * A token with no leading digits yields 0.
 *
 * @example
 * toInt('42');     // 42
 * toInt(' -7px');  // -7
 * toInt('abc');    // 0
 */
export function toInt(token: string): number {
  const n = Number.parseInt(token, 10);
  return Number.isNaN(n) ? 0 : n;
}

/**
 * Reads the leading decimal or scientific number of a token.
 * `inf`, `infinity` and `nan` are accepted in any case; a token with nothing numeric yields 0.
 */
export function toFloat(token: string): number {
  const m = NON_FINITE_RE.exec(token);
  if (m) {
    if (m[2].toLowerCase() === 'nan') return Number.NaN;
    return m[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  const n = Number.parseFloat(token);
  return Number.isNaN(n) ? 0 : n;
}

function trimFraction(s: string): string {
  return s.includes('.') ? s.replace(/\.?0+$/, '') : s;
}

/**
 * Formats a number the way C's `%g` does: `precision` significant digits,
 * trailing zeros dropped, exponent notation below 1e-4 or at 10^precision and above.
 *
 * @example
 * formatFloat(0.5);        // '0.5'
 * formatFloat(1234567);    // '1.23457e+06'
 * formatFloat(0.00001);    // '1e-05'
 */
export function formatFloat(value: number, precision = 6): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value < 0 ? '-inf' : 'inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const [mantissa, exp] = value.toExponential(precision - 1).split('e');
  const x = Number(exp);
  if (x < -4 || x >= precision) {
    const sign = x < 0 ? '-' : '+';
    return `${trimFraction(mantissa)}e${sign}${String(Math.abs(x)).padStart(2, '0')}`;
  }
  return trimFraction(value.toFixed(precision - 1 - x));
}
