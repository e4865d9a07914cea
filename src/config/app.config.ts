import { ConfigurationError } from '../common/exceptions/configuration.error';

export const OUT_OF_ORDER_POLICIES = ['skip', 'warn'] as const;
export const COST_BASES = ['price', 'amount'] as const;

// skip: exclude the security and report it. warn: report it and match in row order.
export type OutOfOrderPolicy = (typeof OUT_OF_ORDER_POLICIES)[number];

// price: lot cost is qty × price. amount: broker BuyAmount where present.
export type CostBasis = (typeof COST_BASES)[number];

export interface FifoOptions {
  outOfOrderPolicy: OutOfOrderPolicy;
  costBasis: CostBasis;
  costPrecision: number;       // decimal places for cost decrements
}

export interface AppConfig {
  port: number;
  fifo: FifoOptions;
  output: {
    lotsFile: string;
    summaryFile: string;
  };
}

export const APP_CONFIG = Symbol('APP_CONFIG');

export const DEFAULT_FIFO_OPTIONS: FifoOptions = {
  outOfOrderPolicy: 'skip',
  costBasis: 'price',
  costPrecision: 4,
};

export function parseOutOfOrderPolicy(value: string): OutOfOrderPolicy {
  const policy = OUT_OF_ORDER_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new ConfigurationError(
      `Unknown out-of-order policy "${value}", expected one of: ${OUT_OF_ORDER_POLICIES.join(', ')}`,
    );
  }
  return policy;
}

export function parseCostBasis(value: string): CostBasis {
  const basis = COST_BASES.find((candidate) => candidate === value);
  if (!basis) {
    throw new ConfigurationError(
      `Unknown cost basis "${value}", expected one of: ${COST_BASES.join(', ')}`,
    );
  }
  return basis;
}

function parseInteger(name: string, value: string, min: number, max: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got "${value}"`);
  }
  return parsed;
}

/**
 * Reads settings from the environment (populated from .env by the entry points).
 * @throws ConfigurationError on any invalid value
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: env.PORT ? parseInteger('PORT', env.PORT, 1, 65535) : 3000,
    fifo: {
      outOfOrderPolicy: env.FIFO_OUT_OF_ORDER_POLICY
        ? parseOutOfOrderPolicy(env.FIFO_OUT_OF_ORDER_POLICY)
        : DEFAULT_FIFO_OPTIONS.outOfOrderPolicy,
      costBasis: env.FIFO_COST_BASIS
        ? parseCostBasis(env.FIFO_COST_BASIS)
        : DEFAULT_FIFO_OPTIONS.costBasis,
      costPrecision: env.FIFO_COST_PRECISION
        ? parseInteger('FIFO_COST_PRECISION', env.FIFO_COST_PRECISION, 0, 10)
        : DEFAULT_FIFO_OPTIONS.costPrecision,
    },
    output: {
      lotsFile: env.FIFO_LOTS_FILE || 'remaining_purchases.csv',
      summaryFile: env.FIFO_SUMMARY_FILE || 'remaining_summary.csv',
    },
  };
}
