/**
 * Type Definitions for the Scorecard Matching Engine
 *
 * The engine is pure and deterministic - no I/O, no shared state.
 */

import type { OrderRecord, ScorecardRecord } from '../records/types';

/**
 * Canonical comparison key. Never used as an identity.
 */
export type NormalizedName = string;

// ============================================
// OPTIONS
// ============================================

export interface SimilarityWeights {
  tokenWeight: number;
  editWeight: number;
  tokenMatchFloor: number;
}

export interface NormalizeOptions {
  /** Whole tokens removed after case folding */
  honorifics: readonly string[];
  /** Characters treated as separators */
  punctuation: string;
}

export interface NameMatchingOptions extends NormalizeOptions {
  similarity: SimilarityWeights;
}

export interface LinkOptions extends NameMatchingOptions {
  matchThreshold: number;
  /** Order-side name -> scorecard name that it always matches (normalized before use) */
  nameAliases: Readonly<Record<string, string>>;
}

// ============================================
// CANDIDATES
// ============================================

/**
 * All orders that share one normalized entity name.
 */
export interface EntityCandidate {
  normalizedName: NormalizedName;
  /** First raw spelling seen in the order export */
  entityName: string;
  orders: readonly OrderRecord[];
}

/**
 * Read-only grouping of orders by normalized entity, built once per batch.
 */
export interface CandidateIndex {
  candidates: readonly EntityCandidate[];
  byName: ReadonlyMap<NormalizedName, EntityCandidate>;
  /** Normalized order-side alias -> normalized scorecard name */
  aliases: ReadonlyMap<NormalizedName, NormalizedName>;
}

// ============================================
// OUTPUT
// ============================================

/**
 * Outcome of linking one scorecard. One per scorecard record.
 */
export interface MatchResult {
  scorecard: ScorecardRecord;
  /** Normalized display name of the scorecard */
  normalizedName: NormalizedName;
  matched: boolean;
  /** Raw entity name of the winning candidate (only when matched) */
  matchedEntityName?: string;
  /** Normalized name of the winning candidate (only when matched) */
  matchedNormalizedName?: NormalizedName;
  /** Score of the best candidate, 0 when there were none */
  confidence: number;
  candidateCount: number;
  explanation: string;
}

/**
 * Internal type for tracking candidate scores during linking.
 */
export interface CandidateScore {
  candidate: EntityCandidate;
  score: number;
  viaAlias: boolean;
}
