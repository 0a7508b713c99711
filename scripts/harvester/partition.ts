import type { EnumerationTuning } from "./config";
import type { PopularityRange } from "./types";

/**
 * Splits `range` into at most `parts` contiguous sub-ranges whose boundaries
 * are evenly spaced on a log scale, so sparse high-star ranges come out wide
 * and dense low-star ranges narrow. Returned highest first.
 */
export function logPartition(range: PopularityRange, parts: number): PopularityRange[] {
  if (range.low < 0 || range.high < range.low) {
    throw new Error(`Invalid range ${range.low}..${range.high}`);
  }
  const count = Math.max(1, Math.floor(parts));
  const logLow = Math.log(range.low + 1);
  const logHigh = Math.log(range.high + 2);

  // Exclusive edges: edges[i] is the first star count of sub-range i.
  const edges = [range.low];
  for (let i = 1; i < count; i += 1) {
    const edge = Math.round(Math.exp(logLow + ((logHigh - logLow) * i) / count)) - 1;
    edges.push(Math.min(range.high + 1, Math.max(edges[i - 1], edge)));
  }
  edges.push(range.high + 1);

  const ranges: PopularityRange[] = [];
  for (let i = 0; i < count; i += 1) {
    if (edges[i] < edges[i + 1]) {
      ranges.push({ low: edges[i], high: edges[i + 1] - 1 });
    }
  }
  return ranges.reverse();
}

function clampStep(step: number, tuning: EnumerationTuning): number {
  return Math.min(tuning.maxStep, Math.max(tuning.minStep, Math.floor(step)));
}

export function initialStep(cursor: number, tuning: EnumerationTuning): number {
  const band = tuning.densityBands.find((candidate) => cursor <= candidate.upTo);
  const fallback = tuning.densityBands[tuning.densityBands.length - 1];
  return clampStep((band ?? fallback).step, tuning);
}

/** Step for the next slice after accepting a batch of `count` results. */
export function nextStepSize(count: number, step: number, tuning: EnumerationTuning): number {
  if (count < tuning.sparseThreshold) {
    return clampStep(step * tuning.growthFactor, tuning);
  }
  if (count < tuning.nearSaturationThreshold) {
    return clampStep(step, tuning);
  }
  return clampStep(step * tuning.shrinkFactor, tuning);
}

/** Step for re-querying a saturated slice of `width` star values. */
export function shrinkOnSaturation(step: number, width: number, tuning: EnumerationTuning): number {
  return clampStep(Math.min(step, width) / tuning.saturationDivisor, tuning);
}

export function isSaturated(count: number, tuning: EnumerationTuning): boolean {
  return count >= tuning.saturationThreshold;
}

export function formatRange(range: PopularityRange): string {
  return `${range.low.toLocaleString("en-US")}..${range.high.toLocaleString("en-US")}`;
}
