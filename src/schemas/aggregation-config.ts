/**
 * JSON Schema for aggregation configuration.
 * Validates merged defaults and overrides before an aggregator is built.
 */

export const WeightTableSchema = {
  type: 'object',
  required: ['default'],
  additionalProperties: { type: 'number', minimum: 0 },
  minProperties: 1
} as const;

export const AggregationConfigSchema = {
  type: 'object',
  required: ['decayLambda', 'sourceWeights', 'symbolWeights', 'postDiversity'],
  properties: {
    decayLambda: { type: 'number', minimum: 0 },
    sourceWeights: WeightTableSchema,
    symbolWeights: {
      type: 'object',
      required: ['default'],
      additionalProperties: { type: 'number', minimum: 0, maximum: 1 }
    },
    postDiversity: {
      type: 'object',
      required: ['multiplier', 'cap'],
      properties: {
        multiplier: { type: 'number', minimum: 0 },
        cap: { type: 'number', minimum: 1 }
      },
      additionalProperties: false
    }
  },
  additionalProperties: false
} as const;
