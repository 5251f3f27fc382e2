/**
 * Name Similarity Calculator for Player Matching
 *
 * Uses the Jaro-Winkler similarity algorithm which is particularly good for:
 * - Short strings (personal names)
 * - Typos and single-character slips
 * - Prefix matching (names rarely go wrong in the first letters)
 *
 * Scores are on a 0-1 scale.
 */

import { JaroWinklerDistance } from 'natural';
import { BOOST_THRESHOLD, MAX_PREFIX_LENGTH, PREFIX_SCALE } from './constants';
import type { NameSimilarity } from './types';

/**
 * Length of the common leading run of two strings, capped at MAX_PREFIX_LENGTH
 */
const commonPrefixLength = (a: string, b: string): number => {
  const limit = Math.min(MAX_PREFIX_LENGTH, a.length, b.length);
  let length = 0;
  while (length < limit && a[length] === b[length]) {
    length++;
  }
  return length;
};

/**
 * Calculates the similarity between two normalized strings using Jaro-Winkler.
 *
 * Arguments are put in a fixed order before scoring so that
 * calculateNameSimilarity(a, b) === calculateNameSimilarity(b, a).
 *
 * natural boosts every pair by its shared prefix. The plain Jaro score is
 * recovered from that result, and the boost is kept only when Jaro is
 * above BOOST_THRESHOLD.
 *
 * @param a - First normalized string
 * @param b - Second normalized string
 * @returns Similarity score from 0 to 1
 *
 * @example
 * calculateNameSimilarity("MARTHA", "MARHTA") // ~0.961
 * calculateNameSimilarity("DWAYNE", "DUANE")  // 0.84
 * calculateNameSimilarity("AB", "AC")         // 0.667 (Jaro too low for a boost)
 * calculateNameSimilarity("", "")             // 1 (nothing to disagree on)
 * calculateNameSimilarity("", "SMITH")        // 0
 */
export function calculateNameSimilarity(a: string, b: string): number {
  // Exact match, including two empty strings
  if (a === b) {
    return 1;
  }

  // One side empty
  if (!a || !b) {
    return 0;
  }

  const [first, second] = a < b ? [a, b] : [b, a];
  const boosted = JaroWinklerDistance(first, second, {});

  // boosted = jaro + prefix * PREFIX_SCALE * (1 - jaro)
  const prefixWeight = commonPrefixLength(first, second) * PREFIX_SCALE;
  const jaro = (boosted - prefixWeight) / (1 - prefixWeight);
  const similarity = jaro > BOOST_THRESHOLD ? boosted : jaro;

  return Math.max(0, Math.min(1, similarity));
}

/**
 * Scores last and first names independently and combines them.
 *
 * The combined score is the MINIMUM of the two, so a fuzzy match needs
 * both names to clear the threshold on their own.
 *
 * @example
 * calculatePairSimilarity("MÜLLER", "JAN", "MULLER", "JAN")
 * // Returns: { lastName: ~0.9, firstName: 1, combined: ~0.9 }
 */
export function calculatePairSimilarity(
  lastNameA: string,
  firstNameA: string,
  lastNameB: string,
  firstNameB: string
): NameSimilarity {
  const lastName = calculateNameSimilarity(lastNameA, lastNameB);
  const firstName = calculateNameSimilarity(firstNameA, firstNameB);

  return {
    lastName,
    firstName,
    combined: Math.min(lastName, firstName),
  };
}

export default calculateNameSimilarity;
