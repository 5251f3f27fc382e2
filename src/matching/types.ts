/**
 * Type Definitions for the Player Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no file system or external dependencies.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * One person entry, either from the reference roster or from an event file.
 * String fields hold the raw input; the engine never mutates a record.
 */
export interface PlayerRecord {
  /** External identifier (unique in the reference set, may be empty for events) */
  readonly externId: string;
  readonly lastName: string;
  readonly firstName: string;
  readonly sex: string;
  /** Association / nationality code (e.g. "GER") */
  readonly association: string;
  /** Day of birth, null when absent */
  readonly dob: number | null;
  /** Month of birth, null when absent */
  readonly mob: number | null;
  /** Year of birth, null when absent */
  readonly yob: number | null;
}

/**
 * Comparable view of a player record. Derived by the normalizer.
 */
export interface NormalizedPlayer {
  readonly lastName: string;
  readonly firstName: string;
  readonly sex: string;
  readonly association: string;
  readonly dob: number | null;
  readonly mob: number | null;
  readonly yob: number | null;
}

/**
 * Tunable parameters of the engine.
 */
export interface MatchConfig {
  /** Minimum combined name similarity for the fuzzy tier (0-1) */
  fuzzyThreshold: number;
  /** Confidence deducted per detected issue (0-1) */
  issuePenalty: number;
}

export type MatchOptions = Partial<MatchConfig>;

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Strategy that produced a match, in strict priority order.
 */
export type MatchTier = 'EXACT' | 'NAME_SWAP' | 'FUZZY' | 'NONE';

/**
 * Secondary discrepancies detected once a name-level match exists.
 */
export type IssueCode =
  | 'dob-mob-swap'
  | 'dob-mismatch'
  | 'mob-mismatch'
  | 'sex-mismatch'
  | 'nationality-mismatch'
  | 'birth-year-mismatch';

/**
 * Per-name Jaro-Winkler similarities and their combination.
 */
export interface NameSimilarity {
  lastName: number;
  firstName: number;
  /** Minimum of lastName and firstName */
  combined: number;
}

/**
 * Result of matching one event record against the reference set.
 */
export interface MatchOutcome {
  readonly event: PlayerRecord;
  /** Matched reference record (null if NONE) */
  readonly reference: PlayerRecord | null;
  readonly tier: MatchTier;
  /** Combined similarity: 1 for EXACT and NAME_SWAP, 0 for NONE */
  readonly similarity: number;
  readonly nameSimilarity: NameSimilarity;
}

/**
 * Detailed breakdown of how the confidence score was calculated.
 */
export interface ConfidenceBreakdown {
  /** Base confidence given by the tier */
  baseConfidence: number;
  /** Base confidence computed on accent-folded names */
  tolerantBaseConfidence: number;
  /** Total deduction (issue count x penalty) */
  issuePenalty: number;
  /** Score before flooring at 0 */
  rawTotal: number;
}

/**
 * Final per-record verdict handed to reporting.
 */
export interface MatchResult {
  readonly outcome: MatchOutcome;
  /** Final confidence score (0-1) */
  readonly confidence: number;
  /** Confidence with accent- and punctuation-tolerant name comparison (0-1) */
  readonly confidenceTolerant: number;
  /** Issues in detection order */
  readonly issues: readonly IssueCode[];
  readonly breakdown: ConfidenceBreakdown;
  /** Human-readable explanation of the decision */
  readonly explanation: string;
}
