import { LOG_LEVELS, type LogLevel } from '@ledgerline/logger';
import { z } from 'zod';

const envSchema = z.object({
  LEDGERLINE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  LEDGERLINE_TRANSACTION_LOG: z.string().trim().min(1).default('transactions.log'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validate an environment record without caching.
 * @throws Error if validation fails
 */
export function loadEnv(source: Record<string, string | undefined>): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = loadEnv(process.env);
  }
  return validatedEnv;
}

/** Drop the cached environment so the next getter re-reads process.env. */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Threshold for diagnostics when --verbose is not given.
 */
export function getLogLevel(): LogLevel {
  return validateEnv().LEDGERLINE_LOG_LEVEL;
}

/**
 * Default path of the per-event transaction log.
 * `--log-file` on the command line takes precedence.
 */
export function getTransactionLogPath(): string {
  return validateEnv().LEDGERLINE_TRANSACTION_LOG;
}
