/** Splits `items` into consecutive groups of `size`; the last group may be shorter. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const n = Math.floor(size);
  if (!Number.isFinite(n) || n < 1) throw new RangeError(`chunk size must be a positive integer (got ${size})`);
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += n) {
    out.push(items.slice(i, i + n));
  }
  return out;
}
