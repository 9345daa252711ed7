export const HISTOGRAM_THRESHOLDS = [0, 1, 2, 3, 4, 5, 6, 7, 15, 21, 30, 60, 120] as const;

export type HistogramBin = {
  threshold: number;
  count: number;
};

/**
 * Counts each latency into the smallest threshold it does not exceed.
 * Latencies above the largest threshold are not counted anywhere.
 */
export function buildHistogram(latencies: readonly number[]): HistogramBin[] {
  const bins: HistogramBin[] = HISTOGRAM_THRESHOLDS.map((threshold) => ({ threshold, count: 0 }));
  for (const latency of latencies) {
    const bin = bins.find((candidate) => latency <= candidate.threshold);
    if (bin) {
      bin.count += 1;
    }
  }
  return bins;
}

export function trimTrailingEmpty(bins: readonly HistogramBin[]): HistogramBin[] {
  let end = bins.length;
  while (end > 0 && bins[end - 1]?.count === 0) {
    end -= 1;
  }
  return bins.slice(0, end);
}

export function renderBin(bin: HistogramBin, marker = "@"): string {
  return `\t\t${String(bin.threshold).padStart(3)}: ${marker.repeat(bin.count)}`;
}
