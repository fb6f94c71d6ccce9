/**
 * Scorecard Engine
 *
 * Links scorecard sheet rows to the order entities they describe, buckets
 * each entity's orders by day and lays every scorecard out as a fixed-size
 * scene graph ready for a rasterizer.
 *
 * Usage:
 * ```typescript
 * import { resolveBatchConfig, runBatch, renderBatch } from 'scorecard-engine';
 *
 * const outcomes = runBatch(scorecardRows, orderRows, resolveBatchConfig());
 * const images = await renderBatch(outcomes, renderer);
 * ```
 */

export * from './batch';
export * from './matching';
export * from './aggregation';
export * from './layout';
export * from './records';
export { env, loadEnv, resolveBatchConfig, buildBatchConfig, batchConfigSchema, DEFAULT_BRANDING_ASSET } from './config';
export type { BatchConfigOverrides, BatchEnvDefaults } from './config';
export { logger, Logging, AppError } from './utils';
export type { ErrorCode, CalendarDate } from './utils';
export type { BatchConfig, BrandingAsset, EnvConfig } from './types';
