/**
 * Name Similarity for Scorecard Matching
 *
 * Hybrid of two signals:
 * - Token-set overlap: shared tokens / union of tokens. Tolerates reordered
 *   name parts ("smith john" vs "john smith"). Two different tokens still
 *   count as partly shared when they are close spellings ("jon" ~ "john").
 * - Edit ratio: 1 - Levenshtein distance / longer length, taken over the
 *   strings as given and over their alphabetically sorted tokens. Absorbs
 *   typos.
 *
 * score = tokenWeight * tokenOverlap + editWeight * editRatio
 */

import { LevenshteinDistance } from 'natural';
import { DEFAULT_SIMILARITY_WEIGHTS } from './constants';
import { tokenize } from './normalizeName';
import type { NormalizedName, SimilarityWeights } from './types';

const roundScore = (value: number): number => Math.round(value * 10000) / 10000;

/**
 * Levenshtein similarity of two strings, 0-1.
 *
 * @example
 * editRatio("jon", "john") // 0.75
 */
export function editRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - LevenshteinDistance(a, b) / longest;
}

/**
 * Edit ratio that ignores word order: the better of the direct comparison
 * and the comparison of alphabetically sorted tokens.
 */
export function orderIndependentEditRatio(a: NormalizedName, b: NormalizedName): number {
  const direct = editRatio(a, b);
  const sortedA = a.split(' ').sort().join(' ');
  const sortedB = b.split(' ').sort().join(' ');
  return Math.max(direct, editRatio(sortedA, sortedB));
}

/**
 * Token-set ratio with fuzzy token equality.
 *
 * Token pairs are taken greedily by descending similarity; each token is used
 * at most once. Ties go to the pair whose tokens sort first, compared as an
 * unordered pair, so swapping the arguments picks the same pairs.
 */
export function tokenOverlap(
  a: NormalizedName,
  b: NormalizedName,
  tokenMatchFloor: number = DEFAULT_SIMILARITY_WEIGHTS.tokenMatchFloor
): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (tokensA.length === 0 || tokensB.length === 0) {
    return 0;
  }

  const pairs: Array<{ left: string; right: string; key: string; similarity: number }> = [];
  for (const left of tokensA) {
    for (const right of tokensB) {
      const similarity = left === right ? 1 : editRatio(left, right);
      if (similarity >= tokenMatchFloor) {
        const key = left < right ? `${left}\u0000${right}` : `${right}\u0000${left}`;
        pairs.push({ left, right, key, similarity });
      }
    }
  }

  pairs.sort((x, y) => {
    if (y.similarity !== x.similarity) return y.similarity - x.similarity;
    if (x.key === y.key) return 0;
    return x.key < y.key ? -1 : 1;
  });

  const usedLeft = new Set<string>();
  const usedRight = new Set<string>();
  let shared = 0;

  for (const pair of pairs) {
    if (usedLeft.has(pair.left) || usedRight.has(pair.right)) continue;
    usedLeft.add(pair.left);
    usedRight.add(pair.right);
    shared += pair.similarity;
  }

  const union = tokensA.length + tokensB.length - shared;
  return union > 0 ? shared / union : 0;
}

/**
 * Calculates the similarity of two normalized names.
 *
 * Symmetric, bounded to [0, 1], 1 for identical non-empty names and 0 when
 * either name is empty. Rounded to 4 decimal places.
 *
 * @example
 * calculateNameSimilarity("jon smith", "john smith") // 0.8267
 * calculateNameSimilarity("smith john", "john smith") // 1
 * calculateNameSimilarity("", "john smith") // 0
 */
export function calculateNameSimilarity(
  a: NormalizedName,
  b: NormalizedName,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS
): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  const score =
    weights.tokenWeight * tokenOverlap(a, b, weights.tokenMatchFloor) +
    weights.editWeight * orderIndependentEditRatio(a, b);

  return roundScore(Math.max(0, Math.min(1, score)));
}

export default calculateNameSimilarity;
