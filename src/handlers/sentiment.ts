import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { ResourceNotFoundError } from '../db/access';
import { StoredAggregate } from '../types/sentiment';
import { CollectorStatus } from '../types/collection';

/**
 * A single invalid request parameter
 */
interface ParameterError {
  field: string;
  code: string;
  message: string;
}

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
  details?: ParameterError[];
}

/**
 * Aggregate as returned to API clients
 */
export interface SentimentView {
  symbol: string;
  sentiment: number;
  label: string;
  confidence: number;
  observations: number;
  computedAt: string;
}

/**
 * Common CORS headers for all responses
 */
const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,OPTIONS'
};

export const DEFAULT_WINDOW_HOURS = 24;
export const MAX_WINDOW_HOURS = 24 * 30;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

const HOUR_MS = 60 * 60 * 1000;
const SYMBOL_PATTERN = /^[A-Z]{1,5}$/;

/**
 * Create a success response
 */
function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

/**
 * Create an error response
 */
function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details?: ParameterError[]
): APIGatewayProxyResult {
  const body: ErrorResponseBody = {
    error: message,
    code,
    ...(details && { details })
  };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function toSentimentView(aggregate: StoredAggregate): SentimentView {
  return {
    symbol: aggregate.symbol,
    sentiment: round3(aggregate.finalSentiment),
    label: aggregate.sentimentLabel,
    confidence: round3(aggregate.confidence),
    observations: aggregate.totalObservations,
    computedAt: aggregate.computedAt
  };
}

/**
 * Read a numeric query parameter within (0, max]; integers only when asked
 */
function readNumberParam(
  event: APIGatewayProxyEvent,
  field: string,
  fallback: number,
  max: number,
  integer: boolean,
  errors: ParameterError[]
): number {
  const raw = event.queryStringParameters?.[field];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  const valid = Number.isFinite(value) && value > 0 && value <= max && (!integer || Number.isInteger(value));
  if (!valid) {
    errors.push({
      field,
      code: 'INVALID_PARAMETER',
      message: `${field} must be ${integer ? 'an integer' : 'a number'} in (0, ${max}], got '${raw}'`
    });
    return fallback;
  }
  return value;
}

function windowStart(hours: number): string {
  return new Date(Date.now() - hours * HOUR_MS).toISOString();
}

/**
 * Path segments arrive percent-encoded when no path parameters are mapped;
 * undefined for malformed encodings
 */
function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Keep the newest aggregate per symbol
 */
export function latestPerSymbol(aggregates: StoredAggregate[]): StoredAggregate[] {
  const latest = new Map<string, StoredAggregate>();
  for (const aggregate of aggregates) {
    const current = latest.get(aggregate.symbol);
    if (!current || aggregate.computedAt > current.computedAt) {
      latest.set(aggregate.symbol, aggregate);
    }
  }
  return Array.from(latest.values());
}

/**
 * Most-discussed first; ties broken by symbol
 */
function compareByObservations(a: StoredAggregate, b: StoredAggregate): number {
  if (a.totalObservations !== b.totalObservations) {
    return b.totalObservations - a.totalObservations;
  }
  return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
}

/**
 * GET /sentiment
 *
 * Latest aggregate per symbol within the last `hours`, top `limit` by
 * observation count.
 */
export async function listSentiment(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const errors: ParameterError[] = [];
    const hours = readNumberParam(event, 'hours', DEFAULT_WINDOW_HOURS, MAX_WINDOW_HOURS, false, errors);
    const limit = readNumberParam(event, 'limit', DEFAULT_LIMIT, MAX_LIMIT, true, errors);
    if (errors.length > 0) {
      return errorResponse(400, 'Invalid query parameters', 'INVALID_PARAMETER', errors);
    }

    const since = windowStart(hours);
    const aggregates = await SentimentAggregateRepository.listRecent(since);
    const results = latestPerSymbol(aggregates).sort(compareByObservations).slice(0, limit);

    return successResponse({
      since,
      hours,
      count: results.length,
      results: results.map(toSentimentView)
    });
  } catch (error) {
    console.error('Error listing sentiment:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * GET /sentiment/{symbol}
 *
 * Latest aggregate for one symbol plus its history within the last `hours`.
 */
export async function getSymbolSentiment(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const rawSymbol = event.pathParameters?.symbol ?? decodePathSegment(event.path.split('/').pop() ?? '');
    const symbol = rawSymbol?.toUpperCase() ?? '';
    if (!SYMBOL_PATTERN.test(symbol)) {
      return errorResponse(400, 'Invalid symbol', 'INVALID_PARAMETER', [
        { field: 'symbol', code: 'INVALID_PARAMETER', message: `'${rawSymbol ?? event.path}' is not a ticker symbol` }
      ]);
    }

    const errors: ParameterError[] = [];
    const hours = readNumberParam(event, 'hours', DEFAULT_WINDOW_HOURS, MAX_WINDOW_HOURS, false, errors);
    const limit = readNumberParam(event, 'limit', MAX_LIMIT, MAX_LIMIT, true, errors);
    if (errors.length > 0) {
      return errorResponse(400, 'Invalid query parameters', 'INVALID_PARAMETER', errors);
    }

    const latest = await SentimentAggregateRepository.requireLatest(symbol);
    const history = await SentimentAggregateRepository.listHistory(symbol, windowStart(hours), limit);

    return successResponse({
      symbol,
      latest: toSentimentView(latest),
      history: history.map(toSentimentView)
    });
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return errorResponse(404, error.message, 'NOT_FOUND');
    }
    console.error('Error getting symbol sentiment:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * Anything that can report collection status, usually a SentimentCollector
 */
export interface CollectorStatusSource {
  getStatus(): CollectorStatus;
}

export interface SentimentHandlerOptions {
  /** Collector running in the same process, if any */
  collector?: CollectorStatusSource;
}

/**
 * GET /sentiment/status
 *
 * Collection status (when a collector is attached) and store statistics for
 * the last `hours`.
 */
export async function getServiceStatus(
  event: APIGatewayProxyEvent,
  collector?: CollectorStatusSource
): Promise<APIGatewayProxyResult> {
  try {
    const errors: ParameterError[] = [];
    const hours = readNumberParam(event, 'hours', DEFAULT_WINDOW_HOURS, MAX_WINDOW_HOURS, false, errors);
    if (errors.length > 0) {
      return errorResponse(400, 'Invalid query parameters', 'INVALID_PARAMETER', errors);
    }

    const since = windowStart(hours);
    const aggregates = await SentimentAggregateRepository.listRecent(since);
    const lastComputedAt = aggregates.reduce<string | null>(
      (latest, aggregate) => (latest === null || aggregate.computedAt > latest ? aggregate.computedAt : latest),
      null
    );

    return successResponse({
      collector: collector ? collector.getStatus() : null,
      store: {
        since,
        hours,
        aggregates: aggregates.length,
        symbols: new Set(aggregates.map((aggregate) => aggregate.symbol)).size,
        lastComputedAt
      }
    });
  } catch (error) {
    console.error('Error getting service status:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * Build the handler that routes requests based on HTTP method and path
 */
export function createSentimentHandler(
  options: SentimentHandlerOptions = {}
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async (event) => {
    if (event.httpMethod === 'OPTIONS') {
      return { statusCode: 200, headers: CORS_HEADERS, body: '' };
    }

    const path = event.path;
    const method = event.httpMethod;

    // GET /sentiment
    if (method === 'GET' && path === '/sentiment') {
      return listSentiment(event);
    }

    // GET /sentiment/status
    if (method === 'GET' && path === '/sentiment/status') {
      return getServiceStatus(event, options.collector);
    }

    // GET /sentiment/{symbol}
    if (method === 'GET' && path.match(/^\/sentiment\/[^/]+$/)) {
      return getSymbolSentiment(event);
    }

    return errorResponse(404, 'Route not found', 'NOT_FOUND');
  };
}

/**
 * Lambda entry point; no collector runs inside the function
 */
export const handler = createSentimentHandler();
