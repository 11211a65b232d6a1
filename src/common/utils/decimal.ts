// Scores are carried as integer hundredths so that sums and weightings are exact.

export function toHundredths(value: number): number {
  return Math.round(value * 100);
}

export function fromHundredths(hundredths: number): number {
  return hundredths / 100;
}

export function hasAtMostTwoDecimals(value: number): boolean {
  return Number.isFinite(value) && Math.abs(value * 100 - Math.round(value * 100)) < 1e-6;
}

/**
 * Integer division rounded half-to-even (banker's rounding).
 * Both arguments must be integers and the denominator positive.
 */
export function divideHalfEven(numerator: number, denominator: number): number {
  if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || denominator <= 0) {
    throw new RangeError(`divideHalfEven expects integers and a positive denominator, got ${numerator}/${denominator}`);
  }
  const quotient = Math.floor(numerator / denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/** Mean of two-decimal values, rounded half-even to two decimals; null for an empty list. */
export function averageHalfEven(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sum = values.reduce((acc, v) => acc + toHundredths(v), 0);
  return fromHundredths(divideHalfEven(sum, values.length));
}
