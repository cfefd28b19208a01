/**
 * Median of a list of samples. Even counts average the two middle values.
 */
export function median(samples: readonly number[]): number {
  if (samples.length === 0) {
    throw new RangeError('Cannot take the median of no samples');
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 1) {
    return sorted[middle] ?? 0;
  }
  return ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
}
