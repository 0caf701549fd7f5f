/**
 * Symbol Extraction Types
 */

/**
 * How two extractors' symbol sets are merged:
 * - UNION: symbols found by either
 * - INTERSECTION: symbols found by both
 * - PRIORITY_OVERRIDE: the secondary set when it found anything, else the primary
 */
export type SymbolCombinationMode = 'UNION' | 'INTERSECTION' | 'PRIORITY_OVERRIDE';

export type SymbolSetCombiner = (
  primary: ReadonlySet<string>,
  secondary: ReadonlySet<string>
) => Set<string>;

export interface PatternExtractorOptions {
  /** Upper-case tickers accepted as real symbols */
  knownSymbols: Iterable<string>;
  /** Extra words never treated as symbols, on top of the built-in list */
  falsePositives?: Iterable<string>;
  /** Maximum symbols returned per text (default: 10) */
  maxSymbols?: number;
}
