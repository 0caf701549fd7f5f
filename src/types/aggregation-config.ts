/**
 * Aggregation Configuration Types
 */

/**
 * Lookup table of weights keyed by source or symbol. The `default` entry is
 * used for anything the table does not name.
 */
export type WeightTable = Readonly<Record<string, number>> & { readonly default: number };

export interface PostDiversityConfig {
  /** Scale applied to ln(uniquePostCount) */
  readonly multiplier: number;
  /** Upper bound of the post-diversity weight */
  readonly cap: number;
}

/**
 * Read-only configuration injected into a SentimentAggregator
 */
export interface AggregationConfig {
  /** Exponential decay rate per elapsed hour */
  readonly decayLambda: number;
  readonly sourceWeights: WeightTable;
  /** Penalties in [0, 1] for tickers that double as common words */
  readonly symbolWeights: WeightTable;
  readonly postDiversity: PostDiversityConfig;
}

/**
 * Partial overrides accepted by loadAggregationConfig
 */
export interface AggregationConfigOverrides {
  decayLambda?: number;
  sourceWeights?: Record<string, number>;
  symbolWeights?: Record<string, number>;
  postDiversity?: Partial<PostDiversityConfig>;
}
