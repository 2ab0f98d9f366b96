/** Round to whole cents. */
export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Sum with cent rounding at the end. */
export function sumCents(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return roundCents(total);
}
