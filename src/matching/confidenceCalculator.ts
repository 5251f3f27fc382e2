/**
 * Confidence Score Calculator for Player Matching
 *
 * Turns a match outcome into a final verdict:
 * 1. Base confidence from the tier (EXACT 1.0, NAME_SWAP 0.9, FUZZY similarity, NONE 0)
 * 2. Secondary issues found on the matched pair
 * 3. A fixed penalty per issue
 *
 * Formula: confidence = base - issueCount × issuePenalty
 *
 * Final score is floored at 0 and rounded to 4 decimals.
 */

import { CONFIDENCE_PRECISION, TIER_BASE_CONFIDENCE } from './constants';
import { detectIssues } from './comparators';
import { calculatePairSimilarity } from './nameSimilarity';
import { foldForTolerantComparison, normalizePlayer } from './normalizeName';
import type {
  ConfidenceBreakdown,
  IssueCode,
  MatchConfig,
  MatchOutcome,
  MatchResult,
  MatchTier,
  PlayerRecord,
} from './types';

const SCALE = 10 ** CONFIDENCE_PRECISION;

function round(value: number): number {
  return Math.round(value * SCALE) / SCALE;
}

/**
 * Base confidence for a tier. The fuzzy tier passes its similarity through.
 */
export function calculateBaseConfidence(tier: MatchTier, similarity: number): number {
  switch (tier) {
    case 'EXACT':
      return TIER_BASE_CONFIDENCE.EXACT;
    case 'NAME_SWAP':
      return TIER_BASE_CONFIDENCE.NAME_SWAP;
    case 'FUZZY':
      return similarity;
    case 'NONE':
      return TIER_BASE_CONFIDENCE.NONE;
  }
}

/**
 * Fuzzy similarity recomputed on names with accents and punctuation removed.
 * Never lower than the strict similarity.
 *
 * @example
 * // MÜLLER/JAN vs MULLER/JAN: strict 0.9, tolerant 1
 */
export function calculateTolerantSimilarity(
  event: PlayerRecord,
  reference: PlayerRecord,
  strictSimilarity: number
): number {
  const tolerant = calculatePairSimilarity(
    foldForTolerantComparison(event.lastName),
    foldForTolerantComparison(event.firstName),
    foldForTolerantComparison(reference.lastName),
    foldForTolerantComparison(reference.firstName)
  );

  return Math.max(strictSimilarity, tolerant.combined);
}

export interface ConfidenceParams {
  baseConfidence: number;
  tolerantBaseConfidence: number;
  issueCount: number;
  issuePenalty: number;
}

/**
 * Applies the issue penalty to both base scores.
 *
 * @example
 * calculateConfidence({ baseConfidence: 1, tolerantBaseConfidence: 1, issueCount: 1, issuePenalty: 0.05 })
 * // Returns: { confidence: 0.95, confidenceTolerant: 0.95, breakdown: { ... } }
 */
export function calculateConfidence(params: ConfidenceParams): {
  confidence: number;
  confidenceTolerant: number;
  breakdown: ConfidenceBreakdown;
} {
  const { baseConfidence, tolerantBaseConfidence, issueCount, issuePenalty } = params;

  const totalPenalty = issueCount * issuePenalty;
  const rawTotal = baseConfidence - totalPenalty;

  return {
    confidence: round(Math.max(0, rawTotal)),
    confidenceTolerant: round(Math.max(0, tolerantBaseConfidence - totalPenalty)),
    breakdown: {
      baseConfidence: round(baseConfidence),
      tolerantBaseConfidence: round(tolerantBaseConfidence),
      issuePenalty: round(totalPenalty),
      rawTotal: round(rawTotal),
    },
  };
}

/**
 * Generates a human-readable explanation of the verdict.
 */
export function generateExplanation(
  outcome: MatchOutcome,
  breakdown: ConfidenceBreakdown,
  issues: readonly IssueCode[],
  confidence: number
): string {
  if (outcome.tier === 'NONE' || !outcome.reference) {
    return 'No reference record matched by name, swapped name or similarity';
  }

  const parts: string[] = [];
  const referenceId = outcome.reference.externId || '(no id)';

  parts.push(
    `Tier: ${outcome.tier} against reference ${referenceId} (base confidence ${breakdown.baseConfidence})`
  );

  if (issues.length > 0) {
    parts.push(`Issues: ${issues.join(', ')} (-${breakdown.issuePenalty})`);
  } else {
    parts.push('No issues');
  }

  parts.push(`Final confidence: ${confidence}`);

  return parts.join('. ');
}

/**
 * Derives the final match result from an outcome.
 *
 * @example
 * scoreOutcome(exactOutcomeWithSexMismatch, { fuzzyThreshold: 0.85, issuePenalty: 0.05 })
 * // Returns: { confidence: 0.95, issues: ['sex-mismatch'], ... }
 */
export function scoreOutcome(outcome: MatchOutcome, config: MatchConfig): MatchResult {
  const { event, reference, tier, similarity } = outcome;

  const issues: IssueCode[] = reference
    ? detectIssues(normalizePlayer(event), normalizePlayer(reference))
    : [];

  const baseConfidence = calculateBaseConfidence(tier, similarity);
  const tolerantBaseConfidence =
    tier === 'FUZZY' && reference
      ? calculateTolerantSimilarity(event, reference, similarity)
      : baseConfidence;

  const { confidence, confidenceTolerant, breakdown } = calculateConfidence({
    baseConfidence,
    tolerantBaseConfidence,
    issueCount: issues.length,
    issuePenalty: config.issuePenalty,
  });

  return {
    outcome,
    confidence,
    confidenceTolerant,
    issues,
    breakdown,
    explanation: generateExplanation(outcome, breakdown, issues, confidence),
  };
}

export default calculateConfidence;
