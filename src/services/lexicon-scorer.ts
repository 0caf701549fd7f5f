/**
 * Lexicon Sentiment Scorer - keyword-based per-post sentiment in [-1, 1]
 *
 * Each bullish or bearish phrase present in the text scores 1 (2 for
 * multi-word phrases), scaled by an intensifier multiplier. The score is
 * (bullish - bearish) / (bullish + bearish), or 0 when nothing matched.
 */

import { SentimentScorer } from '../types/collection';
import lexicon from '../data/sentiment-lexicon.json';

export interface SentimentLexicon {
  bullish: string[];
  bearish: string[];
  intensifiers: string[];
}

export interface LexiconScore {
  score: number;
  bullishScore: number;
  bearishScore: number;
  intensifierMultiplier: number;
  matchedBullish: string[];
  matchedBearish: string[];
}

const MAX_INTENSIFIER_MULTIPLIER = 2.0;
const INTENSIFIER_STEP = 0.2;
const PHRASE_WEIGHT = 2.0;

interface CompiledPhrase {
  phrase: string;
  pattern: RegExp;
  weight: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compile(phrases: string[]): CompiledPhrase[] {
  return phrases.map((phrase) => {
    const normalized = phrase.trim().toLowerCase();
    return {
      phrase: normalized,
      pattern: new RegExp(`\\b${escapeRegExp(normalized)}\\b`),
      weight: normalized.includes(' ') ? PHRASE_WEIGHT : 1.0
    };
  });
}

export class LexiconSentimentScorer implements SentimentScorer {
  private readonly bullish: CompiledPhrase[];
  private readonly bearish: CompiledPhrase[];
  private readonly intensifiers: CompiledPhrase[];

  constructor(source: SentimentLexicon = lexicon) {
    this.bullish = compile(source.bullish);
    this.bearish = compile(source.bearish);
    this.intensifiers = compile(source.intensifiers);
  }

  score(text: string): number {
    return this.analyze(text).score;
  }

  /**
   * Score with the matched phrases, for diagnostics
   */
  analyze(text: string): LexiconScore {
    const lowered = text.toLowerCase();

    const intensifierCount = this.intensifiers.filter((i) => i.pattern.test(lowered)).length;
    const intensifierMultiplier = Math.min(
      MAX_INTENSIFIER_MULTIPLIER,
      1.0 + intensifierCount * INTENSIFIER_STEP
    );

    const matchedBullish = this.bullish.filter((p) => p.pattern.test(lowered));
    const matchedBearish = this.bearish.filter((p) => p.pattern.test(lowered));

    const bullishScore =
      matchedBullish.reduce((sum, p) => sum + p.weight, 0) * intensifierMultiplier;
    const bearishScore =
      matchedBearish.reduce((sum, p) => sum + p.weight, 0) * intensifierMultiplier;

    const total = bullishScore + bearishScore;
    const score = total === 0 ? 0 : (bullishScore - bearishScore) / total;

    return {
      score: Math.max(-1, Math.min(1, score)),
      bullishScore,
      bearishScore,
      intensifierMultiplier,
      matchedBullish: matchedBullish.map((p) => p.phrase),
      matchedBearish: matchedBearish.map((p) => p.phrase)
    };
  }
}
