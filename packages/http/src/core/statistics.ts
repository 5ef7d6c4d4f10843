// Pure statistics over per-request durations

export interface DurationSummary {
  avg: number;
  max: number;
  median: number;
  min: number;
}

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Middle value; the mean of the two middle values for an even count.
 */
export const median = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;

  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
};

/**
 * Summarize durations; every statistic is 0 when there are no samples.
 */
export const summarizeDurations = (values: readonly number[]): DurationSummary => {
  if (values.length === 0) {
    return { avg: 0, max: 0, median: 0, min: 0 };
  }

  return {
    avg: mean(values),
    max: values.reduce((acc, value) => (value > acc ? value : acc), -Infinity),
    median: median(values),
    min: values.reduce((acc, value) => (value < acc ? value : acc), Infinity),
  };
};
