import type { Histogram, ProfitBand } from "./types";

export interface RunningStats {
  count: number;
  mean: number;
  m2: number;
}

export function createRunningStats(): RunningStats {
  return { count: 0, mean: 0, m2: 0 };
}

export function push(stats: RunningStats, value: number) {
  stats.count += 1;
  const delta = value - stats.mean;
  stats.mean += delta / stats.count;
  const delta2 = value - stats.mean;
  stats.m2 += delta * delta2;
}

export function variance(stats: RunningStats): number {
  if (stats.count < 2) return 0;
  return stats.m2 / (stats.count - 1);
}

export function stdev(stats: RunningStats): number {
  return Math.sqrt(variance(stats));
}

export function confidenceInterval(mean: number, stdev: number, samples: number, z = 1.96): [number, number] {
  if (samples === 0) return [mean, mean];
  const margin = (stdev / Math.sqrt(samples)) * z;
  return [mean - margin, mean + margin];
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Values inside `mean ± k·sigma`, inclusive at both ends. */
export function profitBand(values: number[], mean: number, sigma: number, k: number): ProfitBand {
  const low = mean - k * sigma;
  const high = mean + k * sigma;
  const inside = values.filter((v) => v >= low && v <= high);
  if (inside.length === 0) {
    return { count: 0, share: 0, mean: null, min: null, max: null };
  }
  return {
    count: inside.length,
    share: values.length > 0 ? inside.length / values.length : 0,
    mean: inside.reduce((acc, v) => acc + v, 0) / inside.length,
    min: Math.min(...inside),
    max: Math.max(...inside),
  };
}

export function histogramBinCount(samples: number): number {
  return Math.min(50, Math.max(10, Math.floor(samples / 2)));
}

export function buildHistogram(values: number[], binCount = 21): Histogram {
  if (values.length === 0) {
    return { bins: [], counts: [] };
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = Math.max(1, max - min);
  const bins = Array.from({ length: binCount }, (_, i) => min + (range / binCount) * (i + 0.5));
  const counts: number[] = Array(binCount).fill(0);
  for (const value of values) {
    const idx = Math.min(
      binCount - 1,
      Math.max(0, Math.floor(((value - min) / range) * binCount))
    );
    counts[idx] += 1;
  }
  return { bins, counts };
}
