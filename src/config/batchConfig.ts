import { z } from 'zod';
import { AppError } from '../utils/AppError';
import {
  DEFAULT_HONORIFICS,
  DEFAULT_PUNCTUATION,
  DEFAULT_SIMILARITY_WEIGHTS,
} from '../matching/constants';
import { DEFAULT_STATUS_PALETTE } from '../layout/constants';
import type { BatchConfig, BrandingAsset, EnvConfig } from '../types';

export const DEFAULT_BRANDING_ASSET: BrandingAsset = {
  id: 'brand-logo',
  aspectRatio: 2.5,
};

const colorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #RRGGBB color');

export const batchConfigSchema = z.object({
  matchThreshold: z.number().min(0).max(1),
  excludedSource: z.string().trim().min(1),
  nameAliases: z.record(z.string()),
  statusPalette: z.object({
    colors: z.record(colorSchema),
    fallback: colorSchema,
  }),
  denseCalendar: z.boolean(),
  brandingAsset: z.object({
    id: z.string().min(1),
    aspectRatio: z.number().positive(),
  }),
  scoredFields: z.array(z.string().min(1)).optional(),
  honorifics: z.array(z.string().min(1)),
  punctuation: z.string(),
  similarity: z
    .object({
      tokenWeight: z.number().min(0).max(1),
      editWeight: z.number().min(0).max(1),
      tokenMatchFloor: z.number().min(0).max(1),
    })
    .refine((w) => Math.abs(w.tokenWeight + w.editWeight - 1) < 1e-9, {
      message: 'tokenWeight and editWeight must add up to 1',
    }),
});

export type BatchConfigOverrides = Partial<BatchConfig>;

export type BatchEnvDefaults = Pick<
  EnvConfig,
  'MATCH_THRESHOLD' | 'EXCLUDED_SOURCE' | 'DENSE_CALENDAR'
>;

/**
 * Builds the config for one batch: caller overrides on top of environment
 * defaults on top of the built-in tables.
 *
 * @throws AppError with code INVALID_CONFIG when the merged config is invalid
 */
export function buildBatchConfig(
  overrides: BatchConfigOverrides,
  envConfig: BatchEnvDefaults
): BatchConfig {
  const merged: BatchConfig = {
    matchThreshold: envConfig.MATCH_THRESHOLD,
    excludedSource: envConfig.EXCLUDED_SOURCE,
    nameAliases: {},
    statusPalette: DEFAULT_STATUS_PALETTE,
    denseCalendar: envConfig.DENSE_CALENDAR,
    brandingAsset: DEFAULT_BRANDING_ASSET,
    honorifics: DEFAULT_HONORIFICS,
    punctuation: DEFAULT_PUNCTUATION,
    similarity: DEFAULT_SIMILARITY_WEIGHTS,
    ...overrides,
  };

  const parsed = batchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw AppError.invalidConfig(`Invalid batch configuration: ${issues}`);
  }

  return merged;
}
