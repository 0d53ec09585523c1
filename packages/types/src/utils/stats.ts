/**
 * Small numeric helpers used by the clustering stages.
 */

/**
 * Median of a list; the mean of the two middle values for even counts.
 * Returns undefined for an empty list.
 */
export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid];
  if (upper === undefined) return undefined;

  if (sorted.length % 2 === 1) {
    return upper;
  }

  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Differences between neighbours of an ascending list.
 */
export function consecutiveGaps(sortedValues: readonly number[]): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < sortedValues.length; i++) {
    const prev = sortedValues[i - 1];
    const curr = sortedValues[i];
    if (prev === undefined || curr === undefined) continue;
    gaps.push(curr - prev);
  }
  return gaps;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
