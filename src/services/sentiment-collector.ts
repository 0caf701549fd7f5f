/**
 * Sentiment Collector Service - runs collection cycles end to end
 *
 * One cycle fetches posts from every content source, extracts symbols,
 * scores each post once, builds one observation per (post, symbol),
 * aggregates per symbol and stores each result. A failing source or a
 * failing write is logged and counted; the rest of the cycle continues.
 */

import * as crypto from 'crypto';
import {
  AggregateStore,
  CollectionReport,
  CollectorStatus,
  ContentSource,
  SentimentScorer,
  SocialPost,
  SourceFailure,
  SymbolExtractor
} from '../types/collection';
import { AggregationResult, Observation } from '../types/sentiment';
import { SentimentAggregator } from './sentiment-aggregator';
import { createObservation, ObservationValidationError } from './observation';
import { PeriodicTask } from './periodic-task';

/**
 * Default cadence between collection cycles
 */
export const DEFAULT_COLLECTION_INTERVAL_MS = 30 * 60 * 1000;

/**
 * Delay before retrying after a failed cycle
 */
export const DEFAULT_RETRY_DELAY_MS = 60 * 1000;

export interface SentimentCollectorDeps {
  sources: ContentSource[];
  extractor: SymbolExtractor;
  scorer: SentimentScorer;
  aggregator: SentimentAggregator;
  store: AggregateStore;
  now?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SentimentCollector {
  private readonly now: () => Date;
  private task: PeriodicTask | null = null;
  private lastCollectionAt?: string;
  private lastError?: string;
  private totalCollections = 0;
  private totalObservations = 0;

  constructor(private readonly deps: SentimentCollectorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run a single collection cycle
   */
  async collect(): Promise<CollectionReport> {
    const runId = crypto.randomUUID();
    const startedAt = this.now();
    const computedAt = startedAt.toISOString();

    const { posts, failures } = await this.fetchAll();
    const { observations, skipped } = await this.buildObservations(posts);

    const aggregated = this.deps.aggregator.aggregateMany(observations, { referenceTime: startedAt });
    const results = Array.from(aggregated.values()).sort((a, b) =>
      a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0
    );

    const saveFailures = await this.saveAll(results, computedAt);

    this.totalCollections += 1;
    this.totalObservations += observations.length;
    this.lastCollectionAt = computedAt;

    const report: CollectionReport = {
      runId,
      startedAt: computedAt,
      completedAt: this.now().toISOString(),
      postsFetched: posts.length,
      postsSkipped: skipped,
      observationsBuilt: observations.length,
      symbolsAggregated: results.length,
      symbolsSaved: results.length - saveFailures.length,
      sourceFailures: failures,
      saveFailures,
      results
    };

    console.log(`[SentimentCollector] Collection ${runId} completed`, {
      postsFetched: report.postsFetched,
      observationsBuilt: report.observationsBuilt,
      symbolsSaved: report.symbolsSaved,
      sourceFailures: failures.length,
      saveFailures: saveFailures.length
    });

    return report;
  }

  /**
   * Collect now and then every intervalMs until stop() is called.
   * Restarting reuses the same task, so a cycle still finishing after
   * stop() is never joined by a second one.
   */
  start(
    intervalMs: number = DEFAULT_COLLECTION_INTERVAL_MS,
    retryDelayMs: number = DEFAULT_RETRY_DELAY_MS
  ): void {
    if (this.task?.running) {
      console.warn('[SentimentCollector] Collector is already running');
      return;
    }

    console.log(`[SentimentCollector] Starting collection every ${Math.round(intervalMs / 60000)} minutes`);
    if (!this.task) {
      this.task = new PeriodicTask(
        async () => {
          await this.collect();
          this.lastError = undefined;
        },
        {
          intervalMs,
          retryDelayMs,
          onError: (error) => {
            this.lastError = errorMessage(error);
            console.error('[SentimentCollector] Collection cycle failed:', error);
          }
        }
      );
    }
    this.task.start({ intervalMs, retryDelayMs });
  }

  async stop(): Promise<void> {
    if (!this.task) {
      return;
    }
    console.log('[SentimentCollector] Stopping collection');
    await this.task.stop();
  }

  getStatus(): CollectorStatus {
    return {
      running: this.task?.running ?? false,
      intervalMs: this.task?.intervalMs,
      lastCollectionAt: this.lastCollectionAt,
      totalCollections: this.totalCollections,
      totalObservations: this.totalObservations,
      lastError: this.lastError
    };
  }

  private async fetchAll(): Promise<{ posts: SocialPost[]; failures: SourceFailure[] }> {
    const posts: SocialPost[] = [];
    const failures: SourceFailure[] = [];

    for (const source of this.deps.sources) {
      try {
        posts.push(...(await source.fetchPosts()));
      } catch (error) {
        console.error(`[SentimentCollector] Error fetching from ${source.name}:`, error);
        failures.push({ source: source.name, error: errorMessage(error) });
      }
    }

    return { posts, failures };
  }

  private async buildObservations(
    posts: SocialPost[]
  ): Promise<{ observations: Observation[]; skipped: number }> {
    const observations: Observation[] = [];
    let skipped = 0;

    for (const post of posts) {
      const symbols = this.deps.extractor.extract(post.text);
      if (symbols.length === 0) {
        continue;
      }

      try {
        const rawSentiment = await this.deps.scorer.score(post.text);
        for (const symbol of symbols) {
          observations.push(
            createObservation({
              symbol,
              rawSentiment,
              timestamp: post.createdAt,
              source: post.source,
              text: post.text,
              postId: post.postId
            })
          );
        }
      } catch (error) {
        if (!(error instanceof ObservationValidationError)) {
          console.error(`[SentimentCollector] Scoring failed for post ${post.postId}:`, error);
        } else {
          console.warn(`[SentimentCollector] Skipping post ${post.postId}: ${error.message}`);
        }
        skipped += 1;
      }
    }

    return { observations, skipped };
  }

  private async saveAll(results: AggregationResult[], computedAt: string): Promise<string[]> {
    const failures: string[] = [];

    for (const result of results) {
      try {
        await this.deps.store.saveAggregate(result, computedAt);
      } catch (error) {
        console.error(`[SentimentCollector] Error saving ${result.symbol}:`, error);
        failures.push(result.symbol);
      }
    }

    return failures;
  }
}
