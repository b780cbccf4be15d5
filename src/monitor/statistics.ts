export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Nearest-rank percentile: the value at index floor(p * n) of the sorted
 * samples, clamped to the last one. p is in [0, 1].
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.min(Math.floor(p * sorted.length), sorted.length - 1);
  return sorted[Math.max(0, idx)];
}
