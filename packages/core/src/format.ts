export function formatInteger(n: number): string {
  return String(n);
}

/**
 * Decimal rendering that always reads back as a Float literal: it keeps a `.`,
 * never uses an exponent and keeps the sign of negative zero.
 */
export function formatFloat(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (!Number.isFinite(n)) return n > 0 ? 'Infinity' : '-Infinity';
  const sign = n < 0 || Object.is(n, -0) ? '-' : '';
  const digits = expandExponent(Math.abs(n).toString());
  return sign + (digits.includes('.') ? digits : `${digits}.0`);
}

// `1.5e-7` -> `0.00000015`, `1e+21` -> `1000000000000000000000`
function expandExponent(repr: string): string {
  const e = repr.indexOf('e');
  if (e < 0) return repr;
  const mantissa = repr.slice(0, e);
  const exponent = Number(repr.slice(e + 1));
  const dot = mantissa.indexOf('.');
  const intPart = dot < 0 ? mantissa : mantissa.slice(0, dot);
  const fracPart = dot < 0 ? '' : mantissa.slice(dot + 1);
  const digits = intPart + fracPart;
  const point = intPart.length + exponent;
  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}
