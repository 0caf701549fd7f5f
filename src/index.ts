/**
 * Social sentiment aggregation: public entry point
 */

export * from './types/sentiment';
export * from './types/aggregation-config';
export * from './types/collection';
export * from './types/symbol-extraction';

export * from './services/aggregation-config';
export * from './services/weight-functions';
export * from './services/observation';
export * from './services/sentiment-aggregator';
export * from './services/symbol-combination';
export * from './services/symbol-extractor';
export * from './services/lexicon-scorer';
export * from './services/periodic-task';
export * from './services/sentiment-collector';

export { ResourceNotFoundError } from './db/access';
export { SentimentAggregateRepository, isStoredAggregate, serializeAggregate } from './repositories/sentiment-aggregate';
export { handler as sentimentApiHandler, createSentimentHandler } from './handlers/sentiment';
