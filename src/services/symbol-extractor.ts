/**
 * Symbol Extractors - turn free text into confirmed ticker symbols
 *
 * PatternSymbolExtractor scans for upper-case tokens of one to five letters
 * and keeps those found in a known-symbol universe that are not common
 * words. CombinedSymbolExtractor merges two extractors with a combination
 * mode and re-checks the merged set against the universe.
 */

import { SymbolExtractor } from '../types/collection';
import { PatternExtractorOptions, SymbolCombinationMode } from '../types/symbol-extraction';
import { combineSymbolSets } from './symbol-combination';
import falsePositiveSymbols from '../data/false-positive-symbols.json';

export const DEFAULT_MAX_SYMBOLS = 10;

const SYMBOL_PATTERN = /\b[A-Z]{1,5}\b/g;

export class PatternSymbolExtractor implements SymbolExtractor {
  readonly knownSymbols: ReadonlySet<string>;
  private readonly falsePositives: ReadonlySet<string>;
  private readonly maxSymbols: number;

  constructor(options: PatternExtractorOptions) {
    this.knownSymbols = new Set(Array.from(options.knownSymbols, (s) => s.toUpperCase()));
    this.falsePositives = new Set([
      ...falsePositiveSymbols,
      ...Array.from(options.falsePositives ?? [], (s) => s.toUpperCase())
    ]);
    this.maxSymbols = options.maxSymbols ?? DEFAULT_MAX_SYMBOLS;
  }

  isValidSymbol(symbol: string): boolean {
    return this.knownSymbols.has(symbol.toUpperCase());
  }

  /**
   * Symbols in first-seen order, de-duplicated, at most maxSymbols
   */
  extract(text: string): string[] {
    const found: string[] = [];
    const seen = new Set<string>();

    for (const match of text.toUpperCase().matchAll(SYMBOL_PATTERN)) {
      if (found.length >= this.maxSymbols) {
        break;
      }
      const candidate = match[0];
      if (seen.has(candidate)) {
        continue;
      }
      seen.add(candidate);

      if (!this.falsePositives.has(candidate) && this.knownSymbols.has(candidate)) {
        found.push(candidate);
      }
    }

    return found;
  }
}

export class CombinedSymbolExtractor implements SymbolExtractor {
  constructor(
    private readonly primary: SymbolExtractor,
    private readonly secondary: SymbolExtractor,
    private readonly mode: SymbolCombinationMode,
    private readonly universe?: ReadonlySet<string>
  ) {}

  /**
   * Combined symbols, restricted to the universe when one is given, sorted
   */
  extract(text: string): string[] {
    const combined = combineSymbolSets(
      this.mode,
      new Set(this.primary.extract(text)),
      new Set(this.secondary.extract(text))
    );

    const universe = this.universe;
    const accepted = universe
      ? [...combined].filter((symbol) => universe.has(symbol))
      : [...combined];

    return accepted.sort();
  }
}
