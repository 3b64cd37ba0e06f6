import type { BatchStatistic, Observation } from "../../model/src/schema.js";

export type ValueStats = {
  count: number;
  sum: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  stddev: number | null; // sample (n - 1); null below two values
};

/** Numeric values of one attribute, in observation order. Absent or non-numeric values are skipped. */
export function numericValues(observations: readonly Observation[], attribute: string): number[] {
  const out: number[] = [];
  for (const o of observations) {
    const v = o.values[attribute];
    if (typeof v === "number") out.push(v);
  }
  return out;
}

export function sum(xs: readonly number[]): number {
  let total = 0;
  for (const x of xs) total += x;
  return total;
}

export function mean(xs: readonly number[]): number | null {
  if (xs.length === 0) return null;
  return sum(xs) / xs.length;
}

export function median(xs: readonly number[]): number | null {
  const sorted = [...xs].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const hi = sorted[mid];
  const lo = sorted[mid - 1];
  if (hi === undefined) return null;
  if (sorted.length % 2 === 1 || lo === undefined) return hi;
  return (lo + hi) / 2;
}

export function minOf(xs: readonly number[]): number | null {
  let m: number | null = null;
  for (const x of xs) if (m === null || x < m) m = x;
  return m;
}

export function maxOf(xs: readonly number[]): number | null {
  let m: number | null = null;
  for (const x of xs) if (m === null || x > m) m = x;
  return m;
}

export function sampleStdDev(xs: readonly number[]): number | null {
  if (xs.length < 2) return null;
  const mu = mean(xs);
  if (mu === null) return null;
  let ss = 0;
  for (const x of xs) ss += (x - mu) * (x - mu);
  return Math.sqrt(ss / (xs.length - 1));
}

export function describeValues(xs: readonly number[]): ValueStats {
  return {
    count: xs.length,
    sum: sum(xs),
    min: minOf(xs),
    max: maxOf(xs),
    mean: mean(xs),
    stddev: sampleStdDev(xs),
  };
}

export function batchStatistic(xs: readonly number[], stat: BatchStatistic): number | null {
  switch (stat) {
    case "mean":
      return mean(xs);
    case "median":
      return median(xs);
    case "min":
      return minOf(xs);
    case "max":
      return maxOf(xs);
  }
}
