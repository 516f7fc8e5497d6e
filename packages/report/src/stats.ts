export interface ActivityPoint {
  name?: string;
  stars: number;
  daysSinceCommit: number;
}

export interface ActivitySummary {
  count: number;
  meanStars: number;
  medianStars: number;
  meanDays: number;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function summarize(points: readonly ActivityPoint[]): ActivitySummary {
  if (points.length === 0) {
    throw new Error("No valid data points to plot");
  }

  const stars = points.map((p) => p.stars);
  return {
    count: points.length,
    meanStars: mean(stars),
    medianStars: median(stars),
    meanDays: mean(points.map((p) => p.daysSinceCommit)),
  };
}

export function formatSummary(summary: ActivitySummary): string[] {
  return [
    `n = ${summary.count}`,
    `Mean stars: ${summary.meanStars.toFixed(0)}`,
    `Median stars: ${summary.medianStars.toFixed(0)}`,
    `Mean days since commit: ${summary.meanDays.toFixed(1)}`,
  ];
}

/**
 * Equal-width bins over [min, max]. The maximum lands in the last bin; a
 * constant series collapses into one bin.
 */
export function histogram(values: readonly number[], binCount = 50): HistogramBin[] {
  if (values.length === 0) return [];
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new Error(`binCount must be a positive integer, got ${binCount}`);
  }

  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) {
    return [{ start: min, end: max, count: values.length }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const value of values) {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    bins[index].count++;
  }

  return bins;
}
