/**
 * Constants for the Player Matching Engine
 *
 * Defaults for the tunable parameters and the fixed per-tier confidence table.
 */

import type { MatchConfig } from './types';

// ============================================
// DEFAULT CONFIGURATION
// ============================================

/**
 * Minimum combined name similarity for the fuzzy tier.
 *
 * Examples (first names identical):
 * - MÜLLER vs MULLER = 0.90 → FUZZY ✓
 * - MARTHA vs MARHTA = 0.96 → FUZZY ✓
 * - DWAYNE vs DUANE  = 0.84 → NONE
 */
export const DEFAULT_FUZZY_THRESHOLD = 0.85;

/**
 * Confidence deducted for every secondary issue found on a match.
 */
export const DEFAULT_ISSUE_PENALTY = 0.05;

export const DEFAULT_MATCH_CONFIG: Readonly<MatchConfig> = {
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
  issuePenalty: DEFAULT_ISSUE_PENALTY,
};

// ============================================
// TIER CONFIDENCE
// ============================================

/**
 * Base confidence per tier. FUZZY passes its similarity through instead.
 */
export const TIER_BASE_CONFIDENCE = {
  EXACT: 1.0,
  NAME_SWAP: 0.9,
  NONE: 0.0,
} as const;

/** Decimal places kept on confidence scores */
export const CONFIDENCE_PRECISION = 4;

// ============================================
// JARO-WINKLER PREFIX BOOST
// ============================================

/** Weight of each shared leading character */
export const PREFIX_SCALE = 0.1;

/** Longest shared prefix that earns a boost */
export const MAX_PREFIX_LENGTH = 4;

/**
 * The prefix boost only applies above this plain Jaro score.
 *
 * @example
 * - AB vs AC: Jaro 0.667 → no boost, similarity stays 0.667
 * - MARTHA vs MARHTA: Jaro 0.944 → boosted to 0.961
 */
export const BOOST_THRESHOLD = 0.7;
