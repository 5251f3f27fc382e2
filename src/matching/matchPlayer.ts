/**
 * Main Player Matching Function
 *
 * This is the entry point for the matching engine.
 * Each event record is resolved against the reference set in strict tier order:
 *
 * 1. EXACT - last and first name equal (hash lookup)
 * 2. NAME_SWAP - first and last name exchanged (hash lookup)
 * 3. FUZZY - best Jaro-Winkler candidate at or above the threshold (full scan)
 * 4. NONE - nothing matched
 *
 * A higher tier always wins, even when a lower tier would score better.
 * Ties go to the reference record that comes first in the reference set.
 */

import { fuzzyNameMatch, isExactNameMatch, isNameSwap } from './comparators';
import { scoreOutcome } from './confidenceCalculator';
import { resolveMatchConfig } from './matchConfig';
import { normalizePlayer } from './normalizeName';
import { logger } from '../utils/logger';
import type {
  MatchOptions,
  MatchOutcome,
  MatchResult,
  NameSimilarity,
  NormalizedPlayer,
  PlayerRecord,
} from './types';

// ============================================
// Reference index
// ============================================

export interface IndexedReference {
  record: PlayerRecord;
  normalized: NormalizedPlayer;
}

/**
 * Normalized reference set plus hash indexes for the exact and swap tiers.
 * Built once per run and only read afterwards.
 */
export interface ReferenceIndex {
  readonly entries: readonly IndexedReference[];
  /** Keyed by (last, first) */
  readonly byName: ReadonlyMap<string, IndexedReference[]>;
  /** Keyed by (first, last) */
  readonly bySwappedName: ReadonlyMap<string, IndexedReference[]>;
}

// Normalized names never contain a tab (whitespace is collapsed to spaces)
function nameKey(a: string, b: string): string {
  return `${a}\t${b}`;
}

function addToIndex(
  index: Map<string, IndexedReference[]>,
  key: string,
  entry: IndexedReference
): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(entry);
  } else {
    index.set(key, [entry]);
  }
}

/**
 * Normalizes every reference record once and indexes it by name.
 * Buckets keep reference-set order.
 */
export function buildReferenceIndex(references: readonly PlayerRecord[]): ReferenceIndex {
  const entries: IndexedReference[] = [];
  const byName = new Map<string, IndexedReference[]>();
  const bySwappedName = new Map<string, IndexedReference[]>();

  for (const record of references) {
    const entry: IndexedReference = { record, normalized: normalizePlayer(record) };
    entries.push(entry);
    const { lastName, firstName } = entry.normalized;
    addToIndex(byName, nameKey(lastName, firstName), entry);
    addToIndex(bySwappedName, nameKey(firstName, lastName), entry);
  }

  return { entries, byName, bySwappedName };
}

// ============================================
// Tier selection
// ============================================

const PERFECT_NAMES: NameSimilarity = { lastName: 1, firstName: 1, combined: 1 };
const NO_NAMES: NameSimilarity = { lastName: 0, firstName: 0, combined: 0 };

/**
 * Selects the best reference record for one event record.
 *
 * @param event - Event record to resolve
 * @param index - Indexed reference set
 * @param fuzzyThreshold - Minimum combined similarity for the fuzzy tier
 * @returns Exactly one outcome; reference is null for NONE
 */
export function findBestMatch(
  event: PlayerRecord,
  index: ReferenceIndex,
  fuzzyThreshold: number
): MatchOutcome {
  const normalized = normalizePlayer(event);
  const key = nameKey(normalized.lastName, normalized.firstName);

  // ============================================
  // Tier 1: Exact name
  // ============================================
  const exact = index.byName
    .get(key)
    ?.find((candidate) => isExactNameMatch(normalized, candidate.normalized));
  if (exact) {
    return {
      event,
      reference: exact.record,
      tier: 'EXACT',
      similarity: 1,
      nameSimilarity: PERFECT_NAMES,
    };
  }

  // ============================================
  // Tier 2: Name swap
  // ============================================
  const swapped = index.bySwappedName
    .get(key)
    ?.find((candidate) => isNameSwap(normalized, candidate.normalized));
  if (swapped) {
    return {
      event,
      reference: swapped.record,
      tier: 'NAME_SWAP',
      similarity: 1,
      nameSimilarity: PERFECT_NAMES,
    };
  }

  // ============================================
  // Tier 3: Fuzzy (highest combined score, first wins ties)
  // ============================================
  let best: { entry: IndexedReference; similarity: NameSimilarity } | undefined;

  for (const entry of index.entries) {
    const similarity = fuzzyNameMatch(normalized, entry.normalized, fuzzyThreshold);
    if (similarity && (!best || similarity.combined > best.similarity.combined)) {
      best = { entry, similarity };
    }
  }

  if (best) {
    return {
      event,
      reference: best.entry.record,
      tier: 'FUZZY',
      similarity: best.similarity.combined,
      nameSimilarity: best.similarity,
    };
  }

  // ============================================
  // Tier 4: No match
  // ============================================
  return {
    event,
    reference: null,
    tier: 'NONE',
    similarity: 0,
    nameSimilarity: NO_NAMES,
  };
}

// ============================================
// Entry points
// ============================================

/**
 * Matches one event record against the reference set.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same output.
 *
 * @param event - Event record to resolve
 * @param references - Reference roster, in its input order
 * @param options - fuzzyThreshold (default 0.85) and issuePenalty (default 0.05)
 * @returns Final verdict with confidence and issues
 * @throws AppError (INVALID_CONFIG) before matching when an option is out of range
 *
 * @example
 * const result = match(
 *   { externId: '', lastName: 'Muller', firstName: 'Jan', sex: 'M', association: 'GER', dob: 12, mob: 5, yob: 1990 },
 *   [{ externId: '1', lastName: 'Müller', firstName: 'Jan', sex: 'M', association: 'GER', dob: 12, mob: 5, yob: 1990 }]
 * );
 * // Returns: { outcome: { tier: 'FUZZY', ... }, confidence: 0.9, issues: [] }
 */
export function match(
  event: PlayerRecord,
  references: readonly PlayerRecord[],
  options: MatchOptions = {}
): MatchResult {
  const config = resolveMatchConfig(options);
  const index = buildReferenceIndex(references);

  return scoreOutcome(findBestMatch(event, index, config.fuzzyThreshold), config);
}

/**
 * Matches every event record, preserving event-record order.
 * The reference index is built once for the whole run.
 */
export function matchAll(
  events: readonly PlayerRecord[],
  references: readonly PlayerRecord[],
  options: MatchOptions = {}
): MatchResult[] {
  const config = resolveMatchConfig(options);
  const index = buildReferenceIndex(references);

  const results = events.map((event) =>
    scoreOutcome(findBestMatch(event, index, config.fuzzyThreshold), config)
  );

  logger.debug(
    `Matched ${results.length} event records against ${references.length} reference records (threshold ${config.fuzzyThreshold})`
  );

  return results;
}

export default match;
