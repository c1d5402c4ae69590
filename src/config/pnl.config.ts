import { z } from 'zod';

export const PNL_CONFIG = 'PNL_CONFIG';

export const SUPPORTED_CHAINS = [
  'eth-mainnet',
  'matic-mainnet',
  'bsc-mainnet',
  'avalanche-mainnet',
  'arbitrum-mainnet',
  'optimism-mainnet',
  'base-mainnet',
  'polygon-zkevm-mainnet',
] as const;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),
  PNL_PRICE_TOLERANCE: z.coerce.number().min(0).max(1).default(0.01),
  PNL_QUOTE_CURRENCY: z.string().min(1).default('USD'),
  PNL_VERBOSE: booleanFlag,
});

export interface PnlConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  priceTolerance: number;   // fraction of balance allowed between queue and reported balance
  quoteCurrency: string;    // display label only
  verbose: boolean;
}

export const DEFAULT_PNL_CONFIG: PnlConfig = {
  nodeEnv: 'development',
  port: 3000,
  priceTolerance: 0.01,
  quoteCurrency: 'USD',
  verbose: false,
};

/**
 * Validates raw environment values into a typed config.
 * @throws ConfigValidationError listing every failing variable
 */
export function validatePnlConfig(env: Record<string, unknown>): PnlConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues);
  }

  const { NODE_ENV, PORT, PNL_PRICE_TOLERANCE, PNL_QUOTE_CURRENCY, PNL_VERBOSE } = result.data;
  return {
    nodeEnv: NODE_ENV,
    port: PORT,
    priceTolerance: PNL_PRICE_TOLERANCE,
    quoteCurrency: PNL_QUOTE_CURRENCY,
    verbose: PNL_VERBOSE,
  };
}
