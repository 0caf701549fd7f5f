import { SentimentCollector } from './sentiment-collector';
import { SentimentAggregator } from './sentiment-aggregator';
import { PatternSymbolExtractor } from './symbol-extractor';
import { AggregateStore, ContentSource, SentimentScorer, SocialPost } from '../types/collection';
import { AggregationResult } from '../types/sentiment';
import { REFERENCE_TIME } from '../test/generators';

const COMPUTED_AT = '2024-06-01T12:00:00.000Z';

function post(postId: string, text: string, createdAt: Date | string = REFERENCE_TIME): SocialPost {
  return { postId, source: 'reddit/r/stocks', text, createdAt };
}

function staticSource(name: string, posts: SocialPost[]): ContentSource {
  return { name, fetchPosts: async () => posts };
}

/**
 * Scores 0.8 for anything mentioning the moon, -0.4 otherwise
 */
const stubScorer: SentimentScorer = {
  score: (text: string) => (text.includes('moon') ? 0.8 : -0.4)
};

interface RecordingStore extends AggregateStore {
  saved: Array<{ result: AggregationResult; computedAt: string }>;
}

function recordingStore(failFor: string[] = []): RecordingStore {
  const saved: Array<{ result: AggregationResult; computedAt: string }> = [];
  return {
    saved,
    saveAggregate: async (result, computedAt) => {
      if (failFor.includes(result.symbol)) {
        throw new Error('ProvisionedThroughputExceededException');
      }
      saved.push({ result, computedAt });
    }
  };
}

function createCollector(sources: ContentSource[], store: AggregateStore, scorer = stubScorer) {
  return new SentimentCollector({
    sources,
    extractor: new PatternSymbolExtractor({ knownSymbols: ['AAPL', 'TSLA'] }),
    scorer,
    aggregator: new SentimentAggregator(),
    store,
    now: () => REFERENCE_TIME
  });
}

const POSTS = [
  post('p1', 'AAPL and TSLA to the moon'),
  post('p2', 'TSLA is overpriced'),
  post('p3', 'no tickers in this one')
];

describe('SentimentCollector', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('collect', () => {
    it('should build one observation per post and symbol and save each aggregate', async () => {
      const store = recordingStore();
      const report = await createCollector([staticSource('stocks', POSTS)], store).collect();

      expect(report.postsFetched).toBe(3);
      expect(report.postsSkipped).toBe(0);
      expect(report.observationsBuilt).toBe(3);
      expect(report.symbolsAggregated).toBe(2);
      expect(report.symbolsSaved).toBe(2);
      expect(report.startedAt).toBe(COMPUTED_AT);
      expect(report.results.map((r) => r.symbol)).toEqual(['AAPL', 'TSLA']);

      const [aapl, tsla] = report.results;
      expect(aapl.totalObservations).toBe(1);
      expect(aapl.finalSentiment).toBeCloseTo(0.8, 10);
      expect(aapl.sentimentLabel).toBe('Strong Bullish');
      expect(tsla.totalObservations).toBe(2);
      expect(tsla.finalSentiment).toBeCloseTo(0.2, 10);
      expect(tsla.sentimentLabel).toBe('Weak Bullish');

      expect(store.saved.map((s) => s.computedAt)).toEqual([COMPUTED_AT, COMPUTED_AT]);
      expect(store.saved.map((s) => s.result.symbol)).toEqual(['AAPL', 'TSLA']);
    });

    it('should score each post once regardless of how many symbols it mentions', async () => {
      const score = jest.fn().mockReturnValue(0.5);
      await createCollector([staticSource('stocks', POSTS)], recordingStore(), { score }).collect();

      // p3 has no symbols and is never scored
      expect(score).toHaveBeenCalledTimes(2);
    });

    it('should continue past a failing source', async () => {
      const broken: ContentSource = {
        name: 'broken',
        fetchPosts: async () => {
          throw new Error('timeout');
        }
      };
      const report = await createCollector(
        [broken, staticSource('stocks', POSTS)],
        recordingStore()
      ).collect();

      expect(report.sourceFailures).toEqual([{ source: 'broken', error: 'timeout' }]);
      expect(report.symbolsSaved).toBe(2);
    });

    it('should record symbols whose save failed', async () => {
      const store = recordingStore(['TSLA']);
      const report = await createCollector([staticSource('stocks', POSTS)], store).collect();

      expect(report.saveFailures).toEqual(['TSLA']);
      expect(report.symbolsSaved).toBe(1);
      expect(store.saved.map((s) => s.result.symbol)).toEqual(['AAPL']);
    });

    it('should skip posts that cannot be scored or dated', async () => {
      const scorer: SentimentScorer = {
        score: async (text: string) => {
          if (text.includes('garbled')) {
            throw new Error('scorer unavailable');
          }
          return 0.3;
        }
      };
      const posts = [
        post('p1', 'AAPL garbled'),
        post('p2', 'AAPL steady', 'not-a-date'),
        post('p3', 'AAPL steady')
      ];
      const report = await createCollector([staticSource('stocks', posts)], recordingStore(), scorer).collect();

      expect(report.postsSkipped).toBe(2);
      expect(report.observationsBuilt).toBe(1);
      expect(report.results[0].finalSentiment).toBeCloseTo(0.3, 10);
    });

    it('should save nothing when no post mentions a known symbol', async () => {
      const store = recordingStore();
      const report = await createCollector(
        [staticSource('stocks', [post('p1', 'quiet day')])],
        store
      ).collect();

      expect(report.symbolsAggregated).toBe(0);
      expect(report.results).toEqual([]);
      expect(store.saved).toEqual([]);
    });
  });

  describe('getStatus', () => {
    it('should track totals across collections', async () => {
      const collector = createCollector([staticSource('stocks', POSTS)], recordingStore());

      expect(collector.getStatus()).toEqual({
        running: false,
        intervalMs: undefined,
        lastCollectionAt: undefined,
        totalCollections: 0,
        totalObservations: 0,
        lastError: undefined
      });

      await collector.collect();
      await collector.collect();

      const status = collector.getStatus();
      expect(status.totalCollections).toBe(2);
      expect(status.totalObservations).toBe(6);
      expect(status.lastCollectionAt).toBe(COMPUTED_AT);
    });
  });

  describe('start and stop', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should collect on start and then on every interval until stopped', async () => {
      const collector = createCollector([staticSource('stocks', POSTS)], recordingStore());

      collector.start(1000);
      expect(collector.getStatus().running).toBe(true);
      expect(collector.getStatus().intervalMs).toBe(1000);

      await jest.advanceTimersByTimeAsync(0);
      expect(collector.getStatus().totalCollections).toBe(1);

      await jest.advanceTimersByTimeAsync(1000);
      expect(collector.getStatus().totalCollections).toBe(2);

      await collector.stop();
      expect(collector.getStatus().running).toBe(false);

      await jest.advanceTimersByTimeAsync(5000);
      expect(collector.getStatus().totalCollections).toBe(2);
    });

    it('should not overlap cycles when restarted before stop settles', async () => {
      let active = 0;
      let maxActive = 0;
      const releases: Array<() => void> = [];
      const slowSource: ContentSource = {
        name: 'slow',
        fetchPosts: async () => {
          active += 1;
          maxActive = Math.max(maxActive, active);
          await new Promise<void>((resolve) => releases.push(resolve));
          active -= 1;
          return POSTS;
        }
      };
      const collector = createCollector([slowSource], recordingStore());

      collector.start(1000);
      await jest.advanceTimersByTimeAsync(0);
      expect(active).toBe(1);

      const stopping = collector.stop();
      collector.start(1000);
      await jest.advanceTimersByTimeAsync(0);
      expect(maxActive).toBe(1);

      releases.shift()?.();
      await stopping;
      expect(collector.getStatus().totalCollections).toBe(1);
      expect(collector.getStatus().running).toBe(true);

      await jest.advanceTimersByTimeAsync(1000);
      expect(active).toBe(1);
      expect(maxActive).toBe(1);

      releases.shift()?.();
      await collector.stop();
      expect(collector.getStatus().totalCollections).toBe(2);
    });

    it('should record the error of a failed cycle', async () => {
      const extractor = {
        extract: (): string[] => {
          throw new Error('extractor crashed');
        }
      };
      const collector = new SentimentCollector({
        sources: [staticSource('stocks', POSTS)],
        extractor,
        scorer: stubScorer,
        aggregator: new SentimentAggregator(),
        store: recordingStore(),
        now: () => REFERENCE_TIME
      });

      collector.start(1000);
      await jest.advanceTimersByTimeAsync(0);
      await collector.stop();

      expect(collector.getStatus().lastError).toBe('extractor crashed');
      expect(collector.getStatus().totalCollections).toBe(0);
    });
  });
});
