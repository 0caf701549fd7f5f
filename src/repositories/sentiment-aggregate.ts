/**
 * Sentiment Aggregate Repository - persists aggregation results
 *
 * Results are stored with symbol as partition key and computedAt as sort key,
 * one item per (symbol, collection run). Diagnostics are not persisted.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { ResourceNotFoundError } from '../db/access';
import { AggregationResult, SENTIMENT_LABELS, StoredAggregate } from '../types/sentiment';

const { partitionKey, sortKey } = KeySchemas.SENTIMENT_AGGREGATES;

/**
 * Newest items read by getLatest, so a malformed newest item does not hide
 * older well-formed ones
 */
export const LATEST_LOOKBACK = 10;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Narrow a raw DynamoDB item to a stored aggregate
 */
export function isStoredAggregate(item: unknown): item is StoredAggregate {
  if (!isRecord(item)) {
    return false;
  }
  const label = item.sentimentLabel;
  return (
    typeof item.symbol === 'string' &&
    typeof item.computedAt === 'string' &&
    typeof item.finalSentiment === 'number' &&
    typeof item.confidence === 'number' &&
    typeof item.totalObservations === 'number' &&
    typeof item.methodologyVersion === 'string' &&
    SENTIMENT_LABELS.some((known) => known === label)
  );
}

/**
 * Serialize an aggregation result for DynamoDB storage
 */
export function serializeAggregate(result: AggregationResult, computedAt: string): StoredAggregate {
  return {
    symbol: result.symbol,
    computedAt,
    finalSentiment: result.finalSentiment,
    sentimentLabel: result.sentimentLabel,
    confidence: result.confidence,
    totalObservations: result.totalObservations,
    methodologyVersion: result.methodologyVersion
  };
}

/**
 * Keep well-formed items, logging any that are not
 */
function toStoredAggregates(items: DynamoDB.DocumentClient.ItemList | undefined): StoredAggregate[] {
  const aggregates: StoredAggregate[] = [];
  for (const item of items ?? []) {
    if (isStoredAggregate(item)) {
      aggregates.push(serializeAggregate(item, item.computedAt));
    } else {
      console.warn('[SentimentAggregateRepository] Skipping malformed item', {
        symbol: item[partitionKey],
        computedAt: item[sortKey]
      });
    }
  }
  return aggregates;
}

async function putAggregate(result: AggregationResult, computedAt: string): Promise<void> {
  await documentClient.put({
    TableName: TableNames.SENTIMENT_AGGREGATES,
    Item: serializeAggregate(result, computedAt)
  }).promise();
}

/**
 * Sentiment Aggregate Repository
 */
export const SentimentAggregateRepository = {
  putAggregate,

  /**
   * AggregateStore entry point used by the collector
   */
  saveAggregate: putAggregate,

  /**
   * Most recent aggregate for a symbol, or null if none was ever stored
   */
  async getLatest(symbol: string): Promise<StoredAggregate | null> {
    const result = await documentClient.query({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      KeyConditionExpression: '#pk = :symbol',
      ExpressionAttributeNames: { '#pk': partitionKey },
      ExpressionAttributeValues: { ':symbol': symbol },
      ScanIndexForward: false,
      Limit: LATEST_LOOKBACK
    }).promise();

    const [latest] = toStoredAggregates(result.Items);
    return latest ?? null;
  },

  /**
   * Most recent aggregate for a symbol
   *
   * @throws ResourceNotFoundError if the symbol has no stored aggregate
   */
  async requireLatest(symbol: string): Promise<StoredAggregate> {
    const latest = await SentimentAggregateRepository.getLatest(symbol);
    if (!latest) {
      throw new ResourceNotFoundError('Sentiment aggregate', symbol);
    }
    return latest;
  },

  /**
   * Aggregates for a symbol computed at or after `since`, newest first
   */
  async listHistory(symbol: string, since: string, limit?: number): Promise<StoredAggregate[]> {
    const result = await documentClient.query({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      KeyConditionExpression: '#pk = :symbol AND #sk >= :since',
      ExpressionAttributeNames: { '#pk': partitionKey, '#sk': sortKey },
      ExpressionAttributeValues: { ':symbol': symbol, ':since': since },
      ScanIndexForward: false,
      ...(limit !== undefined ? { Limit: limit } : {})
    }).promise();

    return toStoredAggregates(result.Items);
  },

  /**
   * Every aggregate computed at or after `since`, across all symbols
   */
  async listRecent(since: string): Promise<StoredAggregate[]> {
    const aggregates: StoredAggregate[] = [];
    let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

    do {
      const result = await documentClient.scan({
        TableName: TableNames.SENTIMENT_AGGREGATES,
        FilterExpression: '#sk >= :since',
        ExpressionAttributeNames: { '#sk': sortKey },
        ExpressionAttributeValues: { ':since': since },
        ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {})
      }).promise();

      aggregates.push(...toStoredAggregates(result.Items));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return aggregates;
  }
};
