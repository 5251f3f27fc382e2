/**
 * Player Matching Engine
 *
 * This module provides pure, deterministic functions for reconciling
 * event player records against a reference roster based on:
 * - Exact and swapped name lookups
 * - Name similarity (Jaro-Winkler algorithm)
 * - Secondary checks on birth data, sex and nationality
 *
 * Usage:
 * ```typescript
 * import { matchAll } from './matching';
 *
 * const results = matchAll(eventPlayers, referencePlayers, { fuzzyThreshold: 0.85 });
 * console.log(results[0].outcome.tier); // 'EXACT' | 'NAME_SWAP' | 'FUZZY' | 'NONE'
 * ```
 */

// Main functions
export { match, matchAll, findBestMatch, buildReferenceIndex } from './matchPlayer';
export { resolveMatchConfig, matchConfigSchema } from './matchConfig';

// Individual building blocks (for testing/debugging)
export {
  normalizeName,
  normalizeWhitespace,
  normalizePlayer,
  foldForTolerantComparison,
} from './normalizeName';
export { calculateNameSimilarity, calculatePairSimilarity } from './nameSimilarity';
export {
  isExactNameMatch,
  isNameSwap,
  fuzzyNameMatch,
  scoreNames,
  isDobMobSwap,
  isDayOfBirthMismatch,
  isMonthOfBirthMismatch,
  isSexMismatch,
  isNationalityMismatch,
  isBirthYearMismatch,
  detectIssues,
} from './comparators';
export {
  calculateBaseConfidence,
  calculateConfidence,
  calculateTolerantSimilarity,
  generateExplanation,
  scoreOutcome,
} from './confidenceCalculator';

// Constants
export {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_ISSUE_PENALTY,
  DEFAULT_MATCH_CONFIG,
  TIER_BASE_CONFIDENCE,
  CONFIDENCE_PRECISION,
} from './constants';

// Types
export type {
  PlayerRecord,
  NormalizedPlayer,
  MatchConfig,
  MatchOptions,
  MatchTier,
  IssueCode,
  NameSimilarity,
  MatchOutcome,
  ConfidenceBreakdown,
  MatchResult,
} from './types';
export type { IndexedReference, ReferenceIndex } from './matchPlayer';
export type { ConfidenceParams } from './confidenceCalculator';
