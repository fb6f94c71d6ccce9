/**
 * Scorecard Matching Engine
 *
 * Pure, deterministic functions that link scorecard records to the order
 * entities they describe:
 * - Name normalization (case, punctuation, honorifics)
 * - Hybrid token-overlap / edit-distance similarity
 * - Best-candidate linking with deterministic tie-breaks
 *
 * Usage:
 * ```typescript
 * import { linkRecords } from './matching';
 *
 * const results = linkRecords(scorecards, orders);
 * console.log(results[0].matched, results[0].confidence);
 * ```
 */

// Main functions
export { linkRecords, linkScorecard, buildCandidateIndex, DEFAULT_LINK_OPTIONS } from './linkRecords';

// Individual scoring functions (for testing/debugging)
export { normalizeName, tokenize, DEFAULT_NORMALIZE_OPTIONS } from './normalizeName';
export {
  calculateNameSimilarity,
  tokenOverlap,
  editRatio,
  orderIndependentEditRatio,
} from './nameSimilarity';

// Constants
export {
  DEFAULT_MATCH_THRESHOLD,
  DEFAULT_SIMILARITY_WEIGHTS,
  DEFAULT_HONORIFICS,
  DEFAULT_PUNCTUATION,
} from './constants';

// Types
export type {
  NormalizedName,
  NormalizeOptions,
  NameMatchingOptions,
  LinkOptions,
  SimilarityWeights,
  EntityCandidate,
  CandidateIndex,
  CandidateScore,
  MatchResult,
} from './types';
