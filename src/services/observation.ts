/**
 * Observation factory - the input boundary of the aggregation engine
 *
 * Timestamps are normalized to a single reference zone: an ISO string's zone
 * offset is discarded and its wall-clock reading is taken as UTC, so that
 * elapsed-time arithmetic never depends on where a post was stamped.
 */

import { Observation, ObservationInput } from '../types/sentiment';

/**
 * Error thrown when an observation cannot be built from upstream data
 */
export class ObservationValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ObservationValidationError';
    this.field = field;
  }
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parse a timestamp, dropping any zone designator and reading the remaining
 * wall-clock time as UTC.
 *
 * @throws ObservationValidationError if the value is not a valid date
 */
export function normalizeTimestamp(value: Date | string): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ObservationValidationError('timestamp', 'timestamp is an invalid Date');
    }
    return new Date(value.getTime());
  }

  const trimmed = value.trim();
  const zoneless = DATE_ONLY.test(trimmed)
    ? `${trimmed}T00:00:00`
    : trimmed.replace(ZONE_SUFFIX, '');
  const parsed = new Date(`${zoneless}Z`);

  if (Number.isNaN(parsed.getTime())) {
    throw new ObservationValidationError('timestamp', `Unparseable timestamp: '${value}'`);
  }
  return parsed;
}

/**
 * Build an immutable Observation. The symbol is upper-cased; the sentiment
 * value is passed through untouched (the scorer owns its range).
 */
export function createObservation(input: ObservationInput): Observation {
  const observation: Observation = {
    symbol: input.symbol.toUpperCase(),
    rawSentiment: input.rawSentiment,
    timestamp: normalizeTimestamp(input.timestamp),
    source: input.source,
    text: input.text,
    ...(input.postId !== undefined ? { postId: input.postId } : {})
  };
  return Object.freeze(observation);
}
