/**
 * Aggregation Configuration Service - builds the read-only configuration a
 * SentimentAggregator is constructed with
 *
 * This service handles:
 * - Default decay rate, source reliability and symbol ambiguity tables
 * - Environment and explicit overrides
 * - JSON schema validation of the merged result
 */

import Ajv, { ErrorObject } from 'ajv';
import { AggregationConfigSchema } from '../schemas/aggregation-config';
import {
  AggregationConfig,
  AggregationConfigOverrides,
  WeightTable
} from '../types/aggregation-config';
import symbolAmbiguity from '../data/symbol-ambiguity.json';

export const DEFAULT_DECAY_LAMBDA = 0.1;
export const DEFAULT_POST_DIVERSITY_MULTIPLIER = 0.3;
export const DEFAULT_POST_DIVERSITY_CAP = 2.0;

/**
 * Source reliability multipliers. Meme-heavy and speculative communities
 * count for less than the platform baseline.
 */
export const DEFAULT_SOURCE_WEIGHTS: WeightTable = {
  reddit: 1.0,
  'reddit/r/investing': 1.0,
  'reddit/r/stocks': 1.0,
  'reddit/r/securityanalysis': 1.0,
  'reddit/r/valueinvesting': 1.0,
  'reddit/r/wallstreetbets': 0.8,
  'reddit/r/pennystocks': 0.7,
  default: 1.0
};

export const DEFAULT_SYMBOL_WEIGHTS: WeightTable = {
  ...symbolAmbiguity.penalties,
  default: symbolAmbiguity.defaultWeight
};

export const DEFAULT_AGGREGATION_CONFIG: AggregationConfig = freezeConfig({
  decayLambda: DEFAULT_DECAY_LAMBDA,
  sourceWeights: DEFAULT_SOURCE_WEIGHTS,
  symbolWeights: DEFAULT_SYMBOL_WEIGHTS,
  postDiversity: {
    multiplier: DEFAULT_POST_DIVERSITY_MULTIPLIER,
    cap: DEFAULT_POST_DIVERSITY_CAP
  }
});

/**
 * Environment variables read by loadAggregationConfig
 */
export const CONFIG_ENV_VARS = {
  DECAY_LAMBDA: 'SENTIMENT_DECAY_LAMBDA',
  POST_DIVERSITY_MULTIPLIER: 'SENTIMENT_POST_DIVERSITY_MULTIPLIER',
  POST_DIVERSITY_CAP: 'SENTIMENT_POST_DIVERSITY_CAP'
} as const;

export interface ConfigViolation {
  path: string;
  message: string;
}

/**
 * Error thrown when a merged configuration fails validation
 */
export class AggregationConfigError extends Error {
  readonly violations: ConfigViolation[];

  constructor(violations: ConfigViolation[]) {
    super(
      `Invalid aggregation configuration: ${violations
        .map((v) => `${v.path} ${v.message}`)
        .join('; ')}`
    );
    this.name = 'AggregationConfigError';
    this.violations = violations;
  }
}

const ajv = new Ajv({ allErrors: true });
const validateConfigSchema = ajv.compile(AggregationConfigSchema);

function convertErrors(errors: ErrorObject[] | null | undefined): ConfigViolation[] {
  if (!errors) return [];

  return errors.map((error) => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error'
  }));
}

function freezeConfig(config: AggregationConfig): AggregationConfig {
  return Object.freeze({
    decayLambda: config.decayLambda,
    sourceWeights: Object.freeze({ ...config.sourceWeights }),
    symbolWeights: Object.freeze({ ...config.symbolWeights }),
    postDiversity: Object.freeze({ ...config.postDiversity })
  });
}

/**
 * Symbol tables are keyed by upper-case ticker
 */
function normalizeSymbolKeys(table: Record<string, number>): Record<string, number> {
  const normalized: Record<string, number> = {};
  for (const [key, weight] of Object.entries(table)) {
    normalized[key === 'default' ? key : key.toUpperCase()] = weight;
  }
  return normalized;
}

function readEnvNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  violations: ConfigViolation[]
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    violations.push({ path: `env.${name}`, message: `must be a number, got '${raw}'` });
    return undefined;
  }
  return value;
}

/**
 * Build a validated, frozen aggregation configuration.
 *
 * Precedence, lowest first: built-in defaults, environment variables,
 * explicit overrides. Weight tables given as overrides are merged over the
 * default tables entry by entry.
 *
 * @throws AggregationConfigError listing every violation found
 */
export function loadAggregationConfig(
  overrides: AggregationConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AggregationConfig {
  const violations: ConfigViolation[] = [];

  const envDecay = readEnvNumber(env, CONFIG_ENV_VARS.DECAY_LAMBDA, violations);
  const envMultiplier = readEnvNumber(env, CONFIG_ENV_VARS.POST_DIVERSITY_MULTIPLIER, violations);
  const envCap = readEnvNumber(env, CONFIG_ENV_VARS.POST_DIVERSITY_CAP, violations);

  const merged = {
    decayLambda: overrides.decayLambda ?? envDecay ?? DEFAULT_DECAY_LAMBDA,
    sourceWeights: { ...DEFAULT_SOURCE_WEIGHTS, ...overrides.sourceWeights },
    symbolWeights: normalizeSymbolKeys({ ...DEFAULT_SYMBOL_WEIGHTS, ...overrides.symbolWeights }),
    postDiversity: {
      multiplier:
        overrides.postDiversity?.multiplier ?? envMultiplier ?? DEFAULT_POST_DIVERSITY_MULTIPLIER,
      cap: overrides.postDiversity?.cap ?? envCap ?? DEFAULT_POST_DIVERSITY_CAP
    }
  };

  if (!validateConfigSchema(merged)) {
    violations.push(...convertErrors(validateConfigSchema.errors));
  }

  if (violations.length > 0) {
    throw new AggregationConfigError(violations);
  }

  return freezeConfig({
    ...merged,
    sourceWeights: toWeightTable(merged.sourceWeights, DEFAULT_SOURCE_WEIGHTS.default),
    symbolWeights: toWeightTable(merged.symbolWeights, DEFAULT_SYMBOL_WEIGHTS.default)
  });
}

/**
 * The schema guarantees a `default` entry; this carries it into the type.
 */
function toWeightTable(table: Record<string, number>, fallback: number): WeightTable {
  return { ...table, default: table.default ?? fallback };
}
