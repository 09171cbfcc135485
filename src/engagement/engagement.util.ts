/**
 * Counts non-overlapping occurrences of `literal` in `text`, case-sensitive.
 */
export function countOccurrences(text: string, literal: string): number {
  if (!literal) return 0;

  let count = 0;
  let index = text.indexOf(literal);
  while (index !== -1) {
    count++;
    index = text.indexOf(literal, index + literal.length);
  }
  return count;
}

/**
 * Rounds to `decimals` places, ties to even on the scaled value.
 * Same result as `rint(value * 10^decimals) / 10^decimals`.
 */
export function roundHalfEven(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return value;

  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded = floor;
  if (fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0)) {
    rounded = floor + 1;
  }
  return rounded / factor;
}
