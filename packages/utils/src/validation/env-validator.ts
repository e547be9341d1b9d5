import { EnvConfigSchema, type EnvConfig } from '@strata/schemas';
import type { ZodIssue } from 'zod';
import { createLogger } from '../logger/logger';

const logger = createLogger('engine:env');

/**
 * Thrown when process.env does not satisfy EnvConfigSchema
 */
export class EnvValidationError extends Error {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Invalid environment variables: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'EnvValidationError';
  }
}

/**
 * Validate environment variables on engine startup.
 *
 * @param env - Variables to validate (default: process.env)
 * @returns Validated environment configuration
 * @throws EnvValidationError if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const error = new EnvValidationError(result.error.issues);
    logger.error({ err: error.message }, 'Invalid environment variables');
    throw error;
  }

  logger.info(
    {
      symbols: result.data.STRATA_SYMBOLS,
      timeframes: result.data.STRATA_TIMEFRAMES,
    },
    'Environment variables validated'
  );
  return result.data;
}
