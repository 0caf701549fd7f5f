/**
 * Symbol Combination Service - merges the symbol sets produced by two
 * extractors according to a named mode
 */

import { SymbolCombinationMode, SymbolSetCombiner } from '../types/symbol-extraction';

export const unionSymbols: SymbolSetCombiner = (primary, secondary) =>
  new Set([...primary, ...secondary]);

export const intersectSymbols: SymbolSetCombiner = (primary, secondary) =>
  new Set([...primary].filter((symbol) => secondary.has(symbol)));

export const overrideSymbols: SymbolSetCombiner = (primary, secondary) =>
  new Set(secondary.size > 0 ? secondary : primary);

/**
 * Resolve the combiner for a mode
 */
export function getSymbolCombiner(mode: SymbolCombinationMode): SymbolSetCombiner {
  switch (mode) {
    case 'UNION':
      return unionSymbols;
    case 'INTERSECTION':
      return intersectSymbols;
    case 'PRIORITY_OVERRIDE':
      return overrideSymbols;
    default: {
      const unhandled: never = mode;
      throw new Error(`Unknown symbol combination mode: ${String(unhandled)}`);
    }
  }
}

export function combineSymbolSets(
  mode: SymbolCombinationMode,
  primary: ReadonlySet<string>,
  secondary: ReadonlySet<string>
): Set<string> {
  return getSymbolCombiner(mode)(primary, secondary);
}
