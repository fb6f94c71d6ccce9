import type { NameMatchingOptions } from '../matching/types';
import type { StatusPalette } from '../layout/types';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: string;
  MATCH_THRESHOLD: number;
  EXCLUDED_SOURCE: string;
  RENDER_CONCURRENCY: number;
  DENSE_CALENDAR: boolean;
}

/**
 * Everything one batch pass needs, injected by the caller.
 * Lookup tables live here rather than in module state so that several
 * batches with different settings can run side by side.
 */
export interface BatchConfig extends NameMatchingOptions {
  /** Minimum similarity (0-1) for a scorecard to be linked to an order entity */
  matchThreshold: number;
  /** Order source whose orders never reach a chart (compared case-insensitively) */
  excludedSource: string;
  /** Order-side entity name -> scorecard display name it always links to */
  nameAliases: Readonly<Record<string, string>>;
  /** Status -> fill color */
  statusPalette: StatusPalette;
  /** Materialize a zero bucket for every day of the period */
  denseCalendar: boolean;
  /** Opaque handle of the logo placed in the header */
  brandingAsset: BrandingAsset;
  /** Checklist columns that make up the overall score; all boolean fields when absent */
  scoredFields?: readonly string[];
}

/**
 * Reference to a vector logo supplied by the asset loader.
 * Only its id and intrinsic aspect ratio matter for layout.
 */
export interface BrandingAsset {
  id: string;
  /** width / height of the artwork */
  aspectRatio: number;
}
