const SIGNIFICANT_DIGITS = 6;

function stripTrailingZeros(digits: string): string {
  return digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;
}

/**
 * Exact binary value of a positive finite double: mantissa * 2^exponent.
 */
function binaryParts(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);

  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  if (biased === 0) {
    return { mantissa: fraction, exponent: -1074 };
  }
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * Round a positive value to the significant digits, ties to even.
 * toFixed and toExponential break exact ties upwards; those are the
 * only inputs this changes.
 */
function roundHalfEven(value: number): number {
  const exponent = Number(value.toExponential().split('e')[1]);
  const scale = exponent - SIGNIFICANT_DIGITS + 1;
  const { mantissa, exponent: binaryExponent } = binaryParts(value);

  // twice = 2 * value / 10^scale, as the fraction numerator / denominator
  const numerator =
    2n *
    mantissa *
    2n ** BigInt(Math.max(binaryExponent, 0)) *
    10n ** BigInt(Math.max(-scale, 0));
  const denominator =
    2n ** BigInt(Math.max(-binaryExponent, 0)) *
    10n ** BigInt(Math.max(scale, 0));

  if (numerator % denominator !== 0n) {
    return value;
  }
  const twice = numerator / denominator;
  if (twice % 2n === 0n) {
    return value;
  }

  const lower = (twice - 1n) / 2n;
  const digits = lower % 2n === 0n ? lower : lower + 1n;
  return Number(`${digits}e${scale}`);
}

/**
 * Render an amount the way a default-configured stream prints a double:
 * six significant digits, trailing zeros dropped, exponent form outside
 * [1e-4, 1e6).
 */
export function formatAmount(value: number): string {
  if (!Number.isFinite(value)) {
    if (Number.isNaN(value)) return 'nan';
    return value > 0 ? 'inf' : '-inf';
  }
  if (value === 0) {
    return '0';
  }

  const rounded = Math.sign(value) * roundHalfEven(Math.abs(value));

  // Exponent after rounding to the significant digits
  const [mantissa, exponentPart] = rounded
    .toExponential(SIGNIFICANT_DIGITS - 1)
    .split('e');
  const exponent = Number(exponentPart);

  if (exponent < -4 || exponent >= SIGNIFICANT_DIGITS) {
    const sign = exponent < 0 ? '-' : '+';
    const magnitude = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripTrailingZeros(mantissa)}e${sign}${magnitude}`;
  }

  return stripTrailingZeros(rounded.toFixed(SIGNIFICANT_DIGITS - 1 - exponent));
}
