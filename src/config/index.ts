import { z } from 'zod';
import { buildBatchConfig, type BatchConfigOverrides } from './batchConfig';
import type { BatchConfig, EnvConfig } from '../types';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  EXCLUDED_SOURCE: z.string().trim().min(1).default('biteme'),
  RENDER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DENSE_CALENDAR: booleanFromEnv,
});

/**
 * Parses environment variables, failing fast with every invalid key listed.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
}

export const env: EnvConfig = loadEnv();

/**
 * Batch config with the process environment supplying the defaults.
 */
export function resolveBatchConfig(overrides: BatchConfigOverrides = {}): BatchConfig {
  return buildBatchConfig(overrides, env);
}

export { buildBatchConfig, batchConfigSchema, DEFAULT_BRANDING_ASSET } from './batchConfig';
export type { BatchConfigOverrides, BatchEnvDefaults } from './batchConfig';
