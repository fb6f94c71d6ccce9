/**
 * Constants for the Scorecard Matching Engine
 *
 * These are the built-in defaults. Every one of them can be replaced through
 * the batch config, so nothing here is read implicitly by the matching
 * functions once options are passed in.
 */

import type { SimilarityWeights } from './types';

// ============================================
// MATCH THRESHOLD
// ============================================

/**
 * Minimum similarity for a scorecard to be linked to an order entity.
 *
 * Lower values pair more loosely spelled names at the cost of false matches:
 * - "jon smith" vs "john smith" → 0.8267 → matched at 0.80
 * - "smith john" vs "john smith" → 1.0 → matched
 */
export const DEFAULT_MATCH_THRESHOLD = 0.8;

// ============================================
// SIMILARITY WEIGHTS
// ============================================

/**
 * Token overlap carries more weight than edit distance so that reordered name
 * parts ("Smith, John" vs "John Smith") still score high, while the edit ratio
 * absorbs typos.
 */
export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  tokenWeight: 0.6,
  editWeight: 0.4,
  /** Two different tokens count as shared when their edit similarity reaches this */
  tokenMatchFloor: 0.7,
};

// ============================================
// NORMALIZATION TABLES
// ============================================

/**
 * Honorifics and suffixes dropped when they stand as whole tokens.
 */
export const DEFAULT_HONORIFICS: readonly string[] = [
  'mr',
  'mrs',
  'ms',
  'miss',
  'dr',
  'prof',
  'sir',
  'jr',
  'sr',
  'ii',
  'iii',
  'iv',
];

/**
 * Characters replaced by a space before tokenizing.
 */
export const DEFAULT_PUNCTUATION = `.,;:!?'"\`()[]{}<>/\\|-_+*#@$%^~=`;
