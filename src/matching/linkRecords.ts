/**
 * Record Linker for Scorecard Matching
 *
 * Pairs every scorecard with at most one order entity.
 *
 * Flow:
 * 1. Group orders by normalized entity name (done once per batch)
 * 2. Normalize the scorecard display name
 * 3. Score every candidate entity
 * 4. Select the best candidate, breaking ties deterministically
 * 5. Apply the match threshold
 * 6. Return a result with a readable explanation
 */

import { normalizeName } from './normalizeName';
import { calculateNameSimilarity } from './nameSimilarity';
import {
  DEFAULT_HONORIFICS,
  DEFAULT_MATCH_THRESHOLD,
  DEFAULT_PUNCTUATION,
  DEFAULT_SIMILARITY_WEIGHTS,
} from './constants';
import type { OrderRecord, ScorecardRecord } from '../records/types';
import type {
  CandidateIndex,
  CandidateScore,
  EntityCandidate,
  LinkOptions,
  MatchResult,
  NormalizeOptions,
} from './types';

export const DEFAULT_LINK_OPTIONS: LinkOptions = {
  matchThreshold: DEFAULT_MATCH_THRESHOLD,
  nameAliases: {},
  honorifics: DEFAULT_HONORIFICS,
  punctuation: DEFAULT_PUNCTUATION,
  similarity: DEFAULT_SIMILARITY_WEIGHTS,
};

/**
 * Groups orders by normalized entity name. Orders whose name normalizes to
 * "" are left out: they can never be matched. Alias keys and targets are
 * normalized with the same options, so callers may write them as raw names.
 *
 * Candidates keep the order in which their names first appear.
 */
export function buildCandidateIndex(
  orders: readonly OrderRecord[],
  options: NormalizeOptions & Partial<Pick<LinkOptions, 'nameAliases'>> = DEFAULT_LINK_OPTIONS
): CandidateIndex {
  const groups = new Map<string, { entityName: string; orders: OrderRecord[] }>();

  for (const order of orders) {
    const normalizedName = normalizeName(order.entityName, options);
    if (!normalizedName) continue;

    const group = groups.get(normalizedName);
    if (group) {
      group.orders.push(order);
    } else {
      groups.set(normalizedName, { entityName: order.entityName.trim(), orders: [order] });
    }
  }

  const candidates: EntityCandidate[] = [...groups.entries()].map(
    ([normalizedName, group]) => ({
      normalizedName,
      entityName: group.entityName,
      orders: group.orders,
    })
  );

  const aliases = new Map<string, string>();
  for (const [from, to] of Object.entries(options.nameAliases ?? {})) {
    const key = normalizeName(from, options);
    const target = normalizeName(to, options);
    if (key && target) {
      aliases.set(key, target);
    }
  }

  return {
    candidates,
    byName: new Map(candidates.map((candidate) => [candidate.normalizedName, candidate])),
    aliases,
  };
}

/**
 * Ordering used to pick the winner: higher score, then more orders, then the
 * lexicographically smallest normalized name.
 */
function compareCandidateScores(a: CandidateScore, b: CandidateScore): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.candidate.orders.length !== b.candidate.orders.length) {
    return b.candidate.orders.length - a.candidate.orders.length;
  }
  if (a.candidate.normalizedName === b.candidate.normalizedName) return 0;
  return a.candidate.normalizedName < b.candidate.normalizedName ? -1 : 1;
}

/**
 * Links one scorecard against a prepared candidate index.
 */
export function linkScorecard(
  scorecard: ScorecardRecord,
  index: CandidateIndex,
  options: LinkOptions = DEFAULT_LINK_OPTIONS
): MatchResult {
  const normalizedName = normalizeName(scorecard.displayName, options);
  const candidateCount = index.candidates.length;

  if (!normalizedName) {
    return {
      scorecard,
      normalizedName,
      matched: false,
      confidence: 0,
      candidateCount,
      explanation: 'Display name is empty after normalization; nothing to match.',
    };
  }

  if (candidateCount === 0) {
    return {
      scorecard,
      normalizedName,
      matched: false,
      confidence: 0,
      candidateCount,
      explanation: 'No order entities to match against.',
    };
  }

  let best: CandidateScore | undefined;
  for (const candidate of index.candidates) {
    const viaAlias = index.aliases.get(candidate.normalizedName) === normalizedName;
    const scored: CandidateScore = {
      candidate,
      score: viaAlias
        ? 1
        : calculateNameSimilarity(normalizedName, candidate.normalizedName, options.similarity),
      viaAlias,
    };
    if (!best || compareCandidateScores(scored, best) < 0) {
      best = scored;
    }
  }

  if (!best || best.score < options.matchThreshold) {
    const confidence = best ? best.score : 0;
    const closest = best
      ? ` Closest entity "${best.candidate.entityName}" scored ${confidence}.`
      : '';
    return {
      scorecard,
      normalizedName,
      matched: false,
      confidence,
      candidateCount,
      explanation: `No entity reached the threshold of ${options.matchThreshold}.${closest}`,
    };
  }

  const how = best.viaAlias ? 'name alias' : `similarity ${best.score}`;
  const orderCount = best.candidate.orders.length;
  return {
    scorecard,
    normalizedName,
    matched: true,
    matchedEntityName: best.candidate.entityName,
    matchedNormalizedName: best.candidate.normalizedName,
    confidence: best.score,
    candidateCount,
    explanation: `Matched "${best.candidate.entityName}" by ${how} (${orderCount} ${orderCount === 1 ? 'order' : 'orders'}).`,
  };
}

/**
 * Links every scorecard to its best order entity.
 *
 * Deterministic: identical input gives identical results, tie-breaks
 * included. Never throws for bad rows; empty names come back unmatched.
 * O(S·C) similarity computations for S scorecards and C distinct entities.
 *
 * @example
 * linkRecords(
 *   [{ displayName: 'Jon Smith', periodStart: '2024-01-01', periodEnd: '2024-01-07', templateFields: {} }],
 *   [{ entityName: 'John Smith', orderDate: '2024-01-02', status: 'completed', source: 'web' }]
 * )
 * // [{ matched: true, matchedEntityName: 'John Smith', confidence: 0.8267, ... }]
 */
export function linkRecords(
  scorecards: readonly ScorecardRecord[],
  orders: readonly OrderRecord[],
  options: LinkOptions = DEFAULT_LINK_OPTIONS
): MatchResult[] {
  const index = buildCandidateIndex(orders, options);
  return scorecards.map((scorecard) => linkScorecard(scorecard, index, options));
}

export default linkRecords;
