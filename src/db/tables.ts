/**
 * DynamoDB table configuration for sentiment aggregates
 */

/**
 * Table name constants - overridable per environment
 */
export const TableNames = {
  SENTIMENT_AGGREGATES: process.env.SENTIMENT_AGGREGATES_TABLE || 'sentiment-aggregates'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Sentiment Aggregates Table
   * - Partition Key: symbol
   * - Sort Key: computedAt (ISO-8601, sorts chronologically)
   */
  SENTIMENT_AGGREGATES: {
    partitionKey: 'symbol',
    sortKey: 'computedAt'
  }
} as const;
