/**
 * Field Comparators for Player Matching
 *
 * Checks over a pair of normalized (event, reference) records.
 *
 * Name-level checks decide whether the pair is a match at all:
 * - Exact name: last and first names equal
 * - Name swap: first and last names exchanged
 * - Fuzzy name: both names within the similarity threshold
 *
 * Secondary checks run only once a name-level match exists:
 * - DoB/MoB swap, day/month mismatch
 * - Sex, nationality and birth-year mismatch
 *
 * A check whose inputs are absent never reports a mismatch.
 */

import { calculatePairSimilarity } from './nameSimilarity';
import type { IssueCode, NameSimilarity, NormalizedPlayer } from './types';

// ============================================
// Helpers
// ============================================

function bothPresent<T extends string | number>(a: T | null, b: T | null): boolean {
  return a !== null && b !== null && a !== '' && b !== '';
}

function differs<T extends string | number>(a: T | null, b: T | null): boolean {
  return bothPresent(a, b) && a !== b;
}

// ============================================
// Name-level checks
// ============================================

export function isExactNameMatch(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  return event.lastName === reference.lastName && event.firstName === reference.firstName;
}

/**
 * True when the event has first and last name exchanged.
 * Names that read the same both ways count as exact, never as a swap.
 */
export function isNameSwap(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  return (
    event.firstName === reference.lastName &&
    event.lastName === reference.firstName &&
    !isExactNameMatch(event, reference)
  );
}

export function scoreNames(event: NormalizedPlayer, reference: NormalizedPlayer): NameSimilarity {
  return calculatePairSimilarity(
    event.lastName,
    event.firstName,
    reference.lastName,
    reference.firstName
  );
}

/**
 * Fuzzy name check: returns the similarity when the combined score reaches
 * the threshold and the pair is neither an exact match nor a swap, else null.
 */
export function fuzzyNameMatch(
  event: NormalizedPlayer,
  reference: NormalizedPlayer,
  threshold: number
): NameSimilarity | null {
  if (isExactNameMatch(event, reference) || isNameSwap(event, reference)) {
    return null;
  }

  const similarity = scoreNames(event, reference);
  return similarity.combined >= threshold ? similarity : null;
}

// ============================================
// Secondary checks
// ============================================

/**
 * True when day and month of birth are exchanged.
 * Equal day and month make the swap a no-op, so that case is never flagged.
 */
export function isDobMobSwap(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  if (!bothPresent(event.dob, reference.mob) || !bothPresent(event.mob, reference.dob)) {
    return false;
  }

  return event.dob === reference.mob && event.mob === reference.dob && event.dob !== event.mob;
}

export function isDayOfBirthMismatch(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  return differs(event.dob, reference.dob);
}

export function isMonthOfBirthMismatch(
  event: NormalizedPlayer,
  reference: NormalizedPlayer
): boolean {
  return differs(event.mob, reference.mob);
}

export function isSexMismatch(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  return differs(event.sex, reference.sex);
}

export function isNationalityMismatch(
  event: NormalizedPlayer,
  reference: NormalizedPlayer
): boolean {
  return differs(event.association, reference.association);
}

export function isBirthYearMismatch(event: NormalizedPlayer, reference: NormalizedPlayer): boolean {
  return differs(event.yob, reference.yob);
}

/**
 * Runs every secondary check on a name-matched pair.
 *
 * Order is fixed so reports are stable across runs:
 * dob-mob-swap (or dob-mismatch, mob-mismatch), sex, nationality, birth year.
 *
 * @returns Issue codes in detection order
 */
export function detectIssues(event: NormalizedPlayer, reference: NormalizedPlayer): IssueCode[] {
  const issues: IssueCode[] = [];

  if (isDobMobSwap(event, reference)) {
    issues.push('dob-mob-swap');
  } else {
    // Individual mismatches only when the pattern is not a swap
    if (isDayOfBirthMismatch(event, reference)) issues.push('dob-mismatch');
    if (isMonthOfBirthMismatch(event, reference)) issues.push('mob-mismatch');
  }

  if (isSexMismatch(event, reference)) issues.push('sex-mismatch');
  if (isNationalityMismatch(event, reference)) issues.push('nationality-mismatch');
  if (isBirthYearMismatch(event, reference)) issues.push('birth-year-mismatch');

  return issues;
}
