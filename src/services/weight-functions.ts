/**
 * Weight Functions - per-observation and per-batch multipliers used by the
 * sentiment aggregator
 *
 * Every function here is pure and total: unknown sources and symbols fall
 * back to the table default, and elapsed time is never negative.
 */

import { Observation } from '../types/sentiment';
import { PostDiversityConfig, WeightTable } from '../types/aggregation-config';

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Hours from `timestamp` to `referenceTime`, floored at zero
 */
export function hoursElapsed(timestamp: Date, referenceTime: Date): number {
  const hours = (referenceTime.getTime() - timestamp.getTime()) / MS_PER_HOUR;
  return Math.max(0, hours);
}

/**
 * Temporal decay: w = e^(-λ × Δh)
 *
 * Result lies in (0, 1] for finite ages and decreases as the observation ages.
 * Observations stamped after the reference time count as brand new.
 */
export function temporalDecayWeight(
  timestamp: Date,
  referenceTime: Date,
  decayLambda: number
): number {
  return Math.exp(-decayLambda * hoursElapsed(timestamp, referenceTime));
}

/**
 * Source reliability lookup.
 *
 * Resolution order: exact key, case-insensitive key, the platform segment
 * before the first `/` (so `reddit/r/anything` falls back to `reddit`), then
 * the table default.
 */
export function sourceReliabilityWeight(source: string, sourceWeights: WeightTable): number {
  if (Object.prototype.hasOwnProperty.call(sourceWeights, source)) {
    return sourceWeights[source];
  }

  const lowered = source.toLowerCase();
  for (const [key, weight] of Object.entries(sourceWeights)) {
    if (key.toLowerCase() === lowered) {
      return weight;
    }
  }

  const separator = lowered.indexOf('/');
  const platform = separator === -1 ? lowered : lowered.slice(0, separator);
  if (platform !== 'default' && Object.prototype.hasOwnProperty.call(sourceWeights, platform)) {
    return sourceWeights[platform];
  }

  return sourceWeights.default;
}

/**
 * Penalty for tickers that coincide with common words (`IT`, `ON`, `ALL`...)
 */
export function symbolAmbiguityWeight(symbol: string, symbolWeights: WeightTable): number {
  const key = symbol.toUpperCase();
  if (key !== 'DEFAULT' && Object.prototype.hasOwnProperty.call(symbolWeights, key)) {
    return symbolWeights[key];
  }
  return symbolWeights.default;
}

/**
 * Boost for symbols discussed across many distinct posts:
 * min(cap, 1 + ln(n) × multiplier) for n > 1, otherwise 1.
 */
export function postDiversityWeight(
  uniquePostCount: number,
  config: PostDiversityConfig
): number {
  if (uniquePostCount <= 1) {
    return 1.0;
  }
  return Math.min(config.cap, 1.0 + Math.log(uniquePostCount) * config.multiplier);
}

/**
 * Distinct post identifiers in the batch. When no observation carries one,
 * every observation counts as its own post.
 */
export function countUniquePosts(observations: readonly Observation[]): number {
  const postIds = new Set<string>();
  for (const observation of observations) {
    if (observation.postId) {
      postIds.add(observation.postId);
    }
  }
  return postIds.size > 0 ? postIds.size : observations.length;
}
