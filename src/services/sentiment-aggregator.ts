/**
 * Sentiment Aggregator Service - combines time-stamped, pre-scored sentiment
 * observations into one bounded sentiment estimate per symbol
 *
 * This service handles:
 * - Multi-factor weighting (temporal decay, source reliability, symbol
 *   ambiguity, post diversity)
 * - Weighted averaging with a zero-weight guard and [-1, 1] clamping
 * - Five-way labelling and a blended confidence score
 * - Grouping mixed observations by symbol
 *
 * The aggregator holds only the configuration it was constructed with, so a
 * single instance can serve any number of concurrent callers.
 */

import {
  AggregateOptions,
  AggregationDiagnostics,
  AggregationResult,
  ConfidenceBreakdown,
  Observation,
  ObservationDiagnostics,
  SentimentLabel
} from '../types/sentiment';
import { AggregationConfig } from '../types/aggregation-config';
import { DEFAULT_AGGREGATION_CONFIG } from './aggregation-config';
import {
  countUniquePosts,
  hoursElapsed,
  postDiversityWeight,
  sourceReliabilityWeight,
  symbolAmbiguityWeight,
  temporalDecayWeight
} from './weight-functions';

export const METHODOLOGY_VERSION = '1.0';

/**
 * Symbol reported for an empty observation list when the caller names none
 */
export const UNKNOWN_SYMBOL = 'UNKNOWN';

export const MIN_SENTIMENT = -1.0;
export const MAX_SENTIMENT = 1.0;

/**
 * Label thresholds, inclusive on the stated side
 */
export const LABEL_THRESHOLDS = {
  STRONG_BULLISH: 0.3,
  WEAK_BULLISH: 0.1,
  WEAK_BEARISH: -0.1,
  STRONG_BEARISH: -0.3
} as const;

/**
 * Confidence blend. Sub-scores are each in [0, 1].
 */
export const CONFIDENCE_WEIGHTS = {
  WEIGHT: 0.4,
  CONSENSUS: 0.4,
  SAMPLE: 0.2
} as const;

/** Consensus score for a lone observation, which cannot show agreement */
export const SINGLE_OBSERVATION_CONSENSUS = 0.8;

/** Observation count at which sample confidence saturates */
export const SAMPLE_SATURATION = 5;

const DIAGNOSTIC_TEXT_LIMIT = 100;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Map a final sentiment value to its label
 */
export function determineSentimentLabel(sentiment: number): SentimentLabel {
  if (sentiment >= LABEL_THRESHOLDS.STRONG_BULLISH) {
    return 'Strong Bullish';
  }
  if (sentiment >= LABEL_THRESHOLDS.WEAK_BULLISH) {
    return 'Weak Bullish';
  }
  if (sentiment <= LABEL_THRESHOLDS.STRONG_BEARISH) {
    return 'Strong Bearish';
  }
  if (sentiment <= LABEL_THRESHOLDS.WEAK_BEARISH) {
    return 'Weak Bearish';
  }
  return 'Neutral';
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Confidence sub-scores for a non-empty batch
 */
export function calculateConfidence(
  rawSentiments: readonly number[],
  weightTotal: number
): ConfidenceBreakdown & { confidence: number } {
  const n = rawSentiments.length;
  if (n === 0) {
    return { weightConfidence: 0, consensusConfidence: 0, sampleConfidence: 0, confidence: 0 };
  }

  const weightConfidence = Math.min(1, weightTotal / n);
  const consensusConfidence =
    n === 1
      ? SINGLE_OBSERVATION_CONSENSUS
      : Math.max(0, 1 - Math.min(1, standardDeviation(rawSentiments) / 2));
  const sampleConfidence = Math.min(1, n / SAMPLE_SATURATION);

  const confidence = clamp(
    CONFIDENCE_WEIGHTS.WEIGHT * weightConfidence +
      CONFIDENCE_WEIGHTS.CONSENSUS * consensusConfidence +
      CONFIDENCE_WEIGHTS.SAMPLE * sampleConfidence,
    0,
    1
  );

  return { weightConfidence, consensusConfidence, sampleConfidence, confidence };
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over observations; summing in this order makes floating-point
 * results independent of the caller's ordering.
 */
export function compareObservations(a: Observation, b: Observation): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime() ||
    a.rawSentiment - b.rawSentiment ||
    compareStrings(a.source, b.source) ||
    compareStrings(a.postId ?? '', b.postId ?? '') ||
    compareStrings(a.text, b.text)
  );
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function truncateText(text: string): string {
  return text.length > DIAGNOSTIC_TEXT_LIMIT ? `${text.slice(0, DIAGNOSTIC_TEXT_LIMIT)}...` : text;
}

/**
 * Sentiment Aggregator
 */
export class SentimentAggregator {
  readonly config: AggregationConfig;

  constructor(config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG) {
    this.config = config;
  }

  /**
   * Aggregate observations of a single symbol.
   *
   * Stock sentiment = Σ(score_i × w_i) / Σ(w_i), clamped to [-1, 1], where
   * w_i = decay × source × symbol × postDiversity. All observations are
   * assumed to share one symbol; the first one names the result.
   */
  aggregate(
    observations: readonly Observation[],
    options: AggregateOptions = {}
  ): AggregationResult {
    if (observations.length === 0) {
      return {
        symbol: options.symbol ?? UNKNOWN_SYMBOL,
        finalSentiment: 0.0,
        sentimentLabel: 'Neutral',
        confidence: 0.0,
        totalObservations: 0,
        methodologyVersion: METHODOLOGY_VERSION
      };
    }

    const { decayLambda, sourceWeights, symbolWeights, postDiversity } = this.config;
    const referenceTime = options.referenceTime ?? new Date();
    const ordered = [...observations].sort(compareObservations);
    const symbol = observations[0].symbol;

    const uniquePostCount = countUniquePosts(ordered);
    const diversityWeight = postDiversityWeight(uniquePostCount, postDiversity);
    const symbolWeight = symbolAmbiguityWeight(symbol, symbolWeights);

    let weightedSum = 0;
    let weightTotal = 0;
    const breakdown: ObservationDiagnostics[] = [];

    for (const observation of ordered) {
      const decayWeight = temporalDecayWeight(observation.timestamp, referenceTime, decayLambda);
      const sourceWeight = sourceReliabilityWeight(observation.source, sourceWeights);
      const combinedWeight = decayWeight * sourceWeight * symbolWeight * diversityWeight;
      const contribution = observation.rawSentiment * combinedWeight;

      weightedSum += contribution;
      weightTotal += combinedWeight;

      if (options.includeDiagnostics) {
        breakdown.push({
          text: truncateText(observation.text),
          rawSentiment: observation.rawSentiment,
          hoursElapsed: round(hoursElapsed(observation.timestamp, referenceTime), 1),
          source: observation.source,
          decayWeight: round(decayWeight, 4),
          sourceWeight: round(sourceWeight, 4),
          symbolWeight: round(symbolWeight, 4),
          postDiversityWeight: round(diversityWeight, 4),
          combinedWeight: round(combinedWeight, 4),
          weightedContribution: round(contribution, 4)
        });
      }
    }

    const weightedAverage = weightTotal > 0 ? weightedSum / weightTotal : 0.0;
    const finalSentiment = clamp(weightedAverage, MIN_SENTIMENT, MAX_SENTIMENT);
    const { confidence, ...confidenceBreakdown } = calculateConfidence(
      ordered.map((o) => o.rawSentiment),
      weightTotal
    );

    const result: AggregationResult = {
      symbol,
      finalSentiment,
      sentimentLabel: determineSentimentLabel(finalSentiment),
      confidence,
      totalObservations: observations.length,
      methodologyVersion: METHODOLOGY_VERSION
    };

    if (options.includeDiagnostics) {
      const diagnostics: AggregationDiagnostics = {
        observations: breakdown,
        uniquePostCount,
        postDiversityWeight: round(diversityWeight, 4),
        weightedSum: round(weightedSum, 4),
        weightTotal: round(weightTotal, 4),
        weightedAverageBeforeClamp: round(weightedAverage, 4),
        finalSentimentAfterClamp: round(finalSentiment, 4),
        decayLambda,
        confidence: confidenceBreakdown
      };
      result.diagnostics = diagnostics;
    }

    return result;
  }

  /**
   * Group observations by symbol and aggregate each group. Every group is
   * measured against the same reference time; symbols absent from the input
   * never appear in the result.
   */
  aggregateMany(
    observations: readonly Observation[],
    options: Omit<AggregateOptions, 'symbol'> = {}
  ): Map<string, AggregationResult> {
    const referenceTime = options.referenceTime ?? new Date();
    const groups = groupBySymbol(observations);

    const results = new Map<string, AggregationResult>();
    for (const [symbol, group] of groups) {
      results.set(symbol, this.aggregate(group, { ...options, referenceTime, symbol }));
    }
    return results;
  }
}

export function groupBySymbol(observations: readonly Observation[]): Map<string, Observation[]> {
  const groups = new Map<string, Observation[]>();
  for (const observation of observations) {
    const group = groups.get(observation.symbol);
    if (group) {
      group.push(observation);
    } else {
      groups.set(observation.symbol, [observation]);
    }
  }
  return groups;
}
