/**
 * Name Normalization for Player Matching
 *
 * Player files come from different tools and keyboards. This module
 * canonicalizes text fields so that case and spacing never cause a mismatch.
 *
 * Example transformations:
 * - "  müller " → "MÜLLER"
 * - "Jan Ove" → "JAN OVE"
 * - "ger" → "GER"
 */

import type { NormalizedPlayer, PlayerRecord } from './types';

// Matches any run of whitespace, Unicode spaces included
const WHITESPACE_PATTERN = /\s+/g;

// Combining diacritical marks left behind by NFD decomposition
const COMBINING_MARKS = /\p{M}/gu;

// Anything that is not a letter or a digit
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;

/**
 * Collapses whitespace runs into single spaces and trims the ends.
 *
 * @example
 * normalizeWhitespace("  Juan \t Carlos ") // Returns: "Juan Carlos"
 */
export function normalizeWhitespace(value: string): string {
  return value.replace(WHITESPACE_PATTERN, ' ').trim();
}

/**
 * Normalizes a field for comparison by:
 * 1. Collapsing whitespace and trimming
 * 2. Converting to uppercase
 * 3. Composing Unicode (NFC) so "Ü" typed either way compares equal
 *
 * Diacritics are kept: MÜLLER and MULLER are different names that meet
 * in the fuzzy tier. Idempotent.
 *
 * @param input - Raw field value (absent values normalize to "")
 * @returns Normalized string suitable for comparison
 *
 * @example
 * normalizeName(" von  Trapp ") // Returns: "VON TRAPP"
 */
export function normalizeName(input: string | null | undefined): string {
  if (!input) {
    return '';
  }

  return normalizeWhitespace(input).toUpperCase().normalize('NFC');
}

/**
 * Folds a name for tolerant comparison: accents, punctuation and spaces are dropped.
 *
 * @example
 * foldForTolerantComparison("José-María") // Returns: "JOSEMARIA"
 * foldForTolerantComparison("O.Brien")    // Returns: "OBRIEN"
 */
export function foldForTolerantComparison(input: string | null | undefined): string {
  return normalizeName(input)
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(NON_ALPHANUMERIC, '');
}

/**
 * Derives the comparable view of a player record.
 */
export function normalizePlayer(record: PlayerRecord): NormalizedPlayer {
  return {
    lastName: normalizeName(record.lastName),
    firstName: normalizeName(record.firstName),
    sex: normalizeName(record.sex),
    association: normalizeName(record.association),
    dob: record.dob,
    mob: record.mob,
    yob: record.yob,
  };
}

export default normalizeName;
