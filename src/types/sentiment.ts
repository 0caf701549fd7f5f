/**
 * Sentiment Aggregation Types
 *
 * Observations are produced upstream (symbol extraction + per-post scoring)
 * and folded into one AggregationResult per symbol.
 */

export type SentimentLabel =
  | 'Strong Bullish'
  | 'Weak Bullish'
  | 'Neutral'
  | 'Weak Bearish'
  | 'Strong Bearish';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = [
  'Strong Bullish',
  'Weak Bullish',
  'Neutral',
  'Weak Bearish',
  'Strong Bearish'
];

/**
 * A single pre-scored sentiment data point for one symbol
 */
export interface Observation {
  readonly symbol: string;
  /** Trusted to lie in [-1, 1]; not re-validated during aggregation */
  readonly rawSentiment: number;
  readonly timestamp: Date;
  /** Origin identifier, e.g. `reddit/r/stocks` */
  readonly source: string;
  /** Original content, kept for diagnostics only */
  readonly text: string;
  /** Originating post; observations sharing one count as a single unique post */
  readonly postId?: string;
}

/**
 * Input accepted by createObservation before timestamp normalization
 */
export interface ObservationInput {
  symbol: string;
  rawSentiment: number;
  timestamp: Date | string;
  source: string;
  text: string;
  postId?: string;
}

export interface ObservationDiagnostics {
  text: string;
  rawSentiment: number;
  hoursElapsed: number;
  source: string;
  decayWeight: number;
  sourceWeight: number;
  symbolWeight: number;
  postDiversityWeight: number;
  combinedWeight: number;
  weightedContribution: number;
}

export interface ConfidenceBreakdown {
  weightConfidence: number;
  consensusConfidence: number;
  sampleConfidence: number;
}

export interface AggregationDiagnostics {
  observations: ObservationDiagnostics[];
  uniquePostCount: number;
  postDiversityWeight: number;
  weightedSum: number;
  weightTotal: number;
  weightedAverageBeforeClamp: number;
  finalSentimentAfterClamp: number;
  decayLambda: number;
  confidence: ConfidenceBreakdown;
}

export interface AggregationResult {
  symbol: string;
  /** Always within [-1, 1] */
  finalSentiment: number;
  sentimentLabel: SentimentLabel;
  /** Always within [0, 1] */
  confidence: number;
  totalObservations: number;
  methodologyVersion: string;
  diagnostics?: AggregationDiagnostics;
}

/**
 * Per-call aggregation options
 */
export interface AggregateOptions {
  /** Point in time ages are measured from (default: now) */
  referenceTime?: Date;
  /** Attach a per-observation weight breakdown to the result */
  includeDiagnostics?: boolean;
  /** Symbol reported when the observation list is empty */
  symbol?: string;
}

/**
 * An aggregation result as persisted, stamped with its computation time.
 * Diagnostics are never stored.
 */
export interface StoredAggregate {
  symbol: string;
  computedAt: string;
  finalSentiment: number;
  sentimentLabel: SentimentLabel;
  confidence: number;
  totalObservations: number;
  methodologyVersion: string;
}
