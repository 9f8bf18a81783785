import { EnvConfigSchema, type EnvConfig } from '@candlesync/schemas';
import { ZodError } from 'zod';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on process startup.
 *
 * Missing credentials or connection parameters are fatal: every problem is
 * logged and the process exits with code 1.
 *
 * @param env - Source of variables (defaults to process.env)
 * @returns Validated environment configuration
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    const config = EnvConfigSchema.parse(env);
    logger.info({ nodeEnv: config.NODE_ENV }, 'Environment variables validated');
    return config;
  } catch (error) {
    logger.error('Invalid environment variables:');
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        logger.error({ variable: issue.path.join('.'), problem: issue.message }, 'Invalid variable');
      }
    } else {
      logger.error({ err: error instanceof Error ? error.message : String(error) });
    }
    logger.error('Please ensure all required environment variables are set. See .env.example for details.');
    process.exit(1);
  }
}
