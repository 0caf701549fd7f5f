import * as fc from 'fast-check';
import { LexiconSentimentScorer } from './lexicon-scorer';

describe('LexiconSentimentScorer', () => {
  const scorer = new LexiconSentimentScorer();

  it('should score purely bullish text as 1', () => {
    const result = scorer.analyze('AAPL to the moon, strong buy');

    expect(result.score).toBe(1);
    expect(result.matchedBullish).toEqual(['moon', 'to the moon', 'buy', 'strong']);
    expect(result.matchedBearish).toEqual([]);
    expect(result.bullishScore).toBe(5);
  });

  it('should weigh multi-word phrases double', () => {
    // bullish "bounce" (1) against bearish "dead cat bounce" (2)
    expect(scorer.score('This looks like a dead cat bounce')).toBeCloseTo(-1 / 3, 10);
  });

  it('should scale both sides by intensifiers', () => {
    const result = scorer.analyze('Massive rally, calls printing, some puts');

    expect(result.intensifierMultiplier).toBeCloseTo(1.2, 10);
    expect(result.bullishScore).toBeCloseTo(2.4, 10);
    expect(result.bearishScore).toBeCloseTo(1.2, 10);
    expect(result.score).toBeCloseTo(1 / 3, 10);
  });

  it('should cap the intensifier multiplier at 2', () => {
    const result = scorer.analyze('very extremely highly massive huge incredible gains');

    expect(result.intensifierMultiplier).toBe(2);
    expect(result.matchedBullish).toEqual(['gains']);
    expect(result.bullishScore).toBe(2);
  });

  it('should only match whole words', () => {
    expect(scorer.score('greenhouse redundancy')).toBe(0);
  });

  it('should score text without sentiment words as 0', () => {
    expect(scorer.score('Nothing to report here')).toBe(0);
  });

  it('should accept a custom lexicon', () => {
    const custom = new LexiconSentimentScorer({ bullish: ['lfg'], bearish: ['ngmi'], intensifiers: [] });

    expect(custom.score('LFG')).toBe(1);
    expect(custom.score('ngmi')).toBe(-1);
  });

  it('should always stay within [-1, 1]', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), (text) => {
        const score = scorer.score(text);
        expect(score).toBeGreaterThanOrEqual(-1);
        expect(score).toBeLessThanOrEqual(1);
      })
    );
  });
});
