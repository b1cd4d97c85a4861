/**
 * Decimal rounding of samples and their display form.
 *
 * @module analysis/rounding
 */

/**
 * Rounds to `digits` decimals, half-to-even, deciding ties on the exact
 * binary value rather than on `value * 10^digits` (which can itself round).
 * 2.675 is stored below the tie and gives 2.67; 0.125 is an exact tie and
 * gives 0.12. The sign survives a result of zero: -0.001 gives -0.
 */
export function roundHalfEven(value: number, digits: number): number {
  // Integers (every double from 2^53 up, and -0) are already rounded.
  if (!Number.isFinite(value) || Number.isInteger(value)) {
    return value;
  }

  // A tie at `digits` places is at least ~1e-21 away from any other double
  // near it, so 30 extra digits are enough to tell ties from near misses.
  const expanded = Math.abs(value).toFixed(digits + 30);
  const [intPart, fracPart = ''] = expanded.split('.');
  const kept = fracPart.slice(0, digits);
  const rest = fracPart.slice(digits);
  const half = '5'.padEnd(rest.length, '0');

  let scaled = BigInt(intPart + kept);
  if (rest > half || (rest === half && scaled % 2n === 1n)) {
    scaled += 1n;
  }

  const text = scaled.toString().padStart(digits + 1, '0');
  const rounded = digits > 0
    ? Number(`${text.slice(0, text.length - digits)}.${text.slice(text.length - digits)}`)
    : Number(text);
  return value < 0 ? -rounded : rounded;
}

/**
 * Formats a sample the way the reports print it: shortest round-trip digits,
 * integral values keep one decimal (`5.0`, `-0.0`), and magnitudes from 1e16
 * up or below 1e-4 use exponent form with at least two exponent digits
 * (`1e+16`, `1.5e-05`).
 */
export function formatValue(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Object.is(value, -0)) return '-0.0';
  if (value === 0) return '0.0';

  const magnitude = Math.abs(value);
  if (magnitude >= 1e16 || magnitude < 1e-4) {
    const [mantissa, exponent] = value.toExponential().split('e');
    const sign = exponent.startsWith('-') ? '-' : '+';
    return `${mantissa}e${sign}${exponent.replace(/^[+-]/, '').padStart(2, '0')}`;
  }
  if (Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}
