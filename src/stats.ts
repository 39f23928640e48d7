/** Central tendency of per-backend timings (seconds, or B/A ratios of them). */

export interface TimingSummary {
  mean: number;
  median: number;
}

/** Both figures are 0 for an empty list. */
export function summarizeTimings(values: readonly number[]): TimingSummary {
  if (values.length === 0) {
    return { mean: 0, median: 0 };
  }

  const ordered = [...values].sort((a, b) => a - b);
  const total = ordered.reduce((sum, v) => sum + v, 0);
  const mid = ordered.length >> 1;

  return {
    mean: total / ordered.length,
    median: ordered.length % 2 === 1 ? ordered[mid] : (ordered[mid - 1] + ordered[mid]) / 2,
  };
}
