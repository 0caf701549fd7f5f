/**
 * Collection Pipeline Types
 *
 * Collaborators the sentiment collector is wired with. Concrete platform
 * clients live outside this package and only need to satisfy these shapes.
 */

import { AggregationResult } from './sentiment';

/**
 * A post as delivered by a content source
 */
export interface SocialPost {
  postId: string;
  /** Origin identifier, e.g. `reddit/r/stocks` */
  source: string;
  text: string;
  createdAt: Date | string;
}

export interface ContentSource {
  readonly name: string;
  fetchPosts(): Promise<SocialPost[]>;
}

/**
 * Turns free text into a set of confirmed ticker symbols
 */
export interface SymbolExtractor {
  extract(text: string): string[];
}

/**
 * Scores a post's sentiment in [-1, 1]
 */
export interface SentimentScorer {
  score(text: string): number | Promise<number>;
}

/**
 * Persists aggregation results; one write per result
 */
export interface AggregateStore {
  saveAggregate(result: AggregationResult, computedAt: string): Promise<void>;
}

export interface SourceFailure {
  source: string;
  error: string;
}

export interface CollectionReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  postsFetched: number;
  /** Posts dropped because scoring or timestamp parsing failed */
  postsSkipped: number;
  observationsBuilt: number;
  symbolsAggregated: number;
  symbolsSaved: number;
  sourceFailures: SourceFailure[];
  saveFailures: string[];
  results: AggregationResult[];
}

export interface CollectorStatus {
  running: boolean;
  intervalMs?: number;
  lastCollectionAt?: string;
  totalCollections: number;
  totalObservations: number;
  lastError?: string;
}
