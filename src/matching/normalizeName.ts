/**
 * Name Normalization for Scorecard Matching
 *
 * Order exports and scorecard sheets spell the same entity differently:
 * emoji, ampersands, stray punctuation, titles. This module folds a raw name
 * into a comparison key.
 *
 * Example transformations:
 * - "Mr. John  Smith Jr." → "john smith"
 * - "Flour & Fire 🔥" → "flour and fire"
 * - "Smith, John" → "smith john"
 */

import { DEFAULT_HONORIFICS, DEFAULT_PUNCTUATION } from './constants';
import type { NormalizedName, NormalizeOptions } from './types';

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  honorifics: DEFAULT_HONORIFICS,
  punctuation: DEFAULT_PUNCTUATION,
};

const NON_ASCII = /[^\x00-\x7F]/g;

const separatorPatterns = new Map<string, RegExp | null>();

function separatorPattern(punctuation: string): RegExp | null {
  const cached = separatorPatterns.get(punctuation);
  if (cached !== undefined) {
    return cached;
  }
  const pattern =
    punctuation.length === 0
      ? null
      : new RegExp(`[${punctuation.replace(/[\\\]\[^-]/g, '\\$&')}]`, 'g');
  separatorPatterns.set(punctuation, pattern);
  return pattern;
}

/**
 * Normalizes a name for comparison by:
 * 1. Dropping non-ASCII characters (emoji, decorations)
 * 2. Spelling out "&" as "and"
 * 3. Converting to lowercase
 * 4. Turning configured punctuation into spaces
 * 5. Removing honorific/suffix tokens (MR, JR, ...)
 * 6. Collapsing whitespace to single spaces
 *
 * Never throws. Empty, whitespace-only or non-string input gives "", which
 * never matches anything.
 *
 * @example
 * normalizeName("  Dr. Jane   O'Neil ") // Returns: "jane o neil"
 * normalizeName("Pachi Pizza & Pasta") // Returns: "pachi pizza and pasta"
 */
export function normalizeName(
  input: string | null | undefined,
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS
): NormalizedName {
  if (!input || typeof input !== 'string') {
    return '';
  }

  let normalized = input.replace(NON_ASCII, '').replace(/&/g, ' and ').toLowerCase();

  const separators = separatorPattern(options.punctuation);
  if (separators) {
    normalized = normalized.replace(separators, ' ');
  }

  const honorifics = new Set(options.honorifics.map((token) => token.toLowerCase()));

  return normalized
    .split(/\s+/)
    .filter((token) => token !== '' && !honorifics.has(token))
    .join(' ');
}

/**
 * Splits a normalized name into its distinct tokens.
 */
export function tokenize(name: NormalizedName): string[] {
  if (!name) return [];
  return [...new Set(name.split(' ').filter(Boolean))];
}

export default normalizeName;
