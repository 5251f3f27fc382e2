/**
 * Report Service for the Player Matcher
 *
 * Turns match results into:
 * - flat report rows (one per event record)
 * - a semicolon-delimited CSV with UTF-8 BOM, which spreadsheet tools
 *   set to a German locale open without an import dialog
 * - an HTML page with the same rows, issue cells highlighted
 * - summary statistics and a terminal summary
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import type { IssueCode, MatchResult, MatchTier } from '../matching/types';
import { Logging, logger } from '../utils';

// ============================================
// Types
// ============================================

export const REPORT_COLUMNS = [
  'Event_ExternID',
  'Event_LastName',
  'Event_FirstName',
  'Event_Sex',
  'Event_Association',
  'Event_DoB',
  'Event_MoB',
  'Event_YoB',
  'Ref_ExternID',
  'Ref_LastName',
  'Ref_FirstName',
  'Ref_Sex',
  'Ref_Association',
  'Ref_DoB',
  'Ref_MoB',
  'Ref_YoB',
  'Match_Type',
  'Confidence',
  'Confidence_Tolerant',
  'Issues',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];
export type ReportRow = Record<ReportColumn, string>;

export interface MatchStats {
  total: number;
  tiers: Record<MatchTier, number>;
  issues: Record<IssueCode, number>;
  /** Matched records with at least one issue */
  withIssues: number;
}

// ============================================
// Rows
// ============================================

const formatNumber = (value: number | null): string => (value === null ? '' : String(value));

/**
 * Flattens a match result into one report row
 */
export function toReportRow(result: MatchResult): ReportRow {
  const { event, reference, tier } = result.outcome;

  return {
    Event_ExternID: event.externId,
    Event_LastName: event.lastName,
    Event_FirstName: event.firstName,
    Event_Sex: event.sex,
    Event_Association: event.association,
    Event_DoB: formatNumber(event.dob),
    Event_MoB: formatNumber(event.mob),
    Event_YoB: formatNumber(event.yob),
    Ref_ExternID: reference?.externId ?? '',
    Ref_LastName: reference?.lastName ?? '',
    Ref_FirstName: reference?.firstName ?? '',
    Ref_Sex: reference?.sex ?? '',
    Ref_Association: reference?.association ?? '',
    Ref_DoB: formatNumber(reference?.dob ?? null),
    Ref_MoB: formatNumber(reference?.mob ?? null),
    Ref_YoB: formatNumber(reference?.yob ?? null),
    Match_Type: tier,
    Confidence: result.confidence.toFixed(4),
    Confidence_Tolerant: result.confidenceTolerant.toFixed(4),
    Issues: result.issues.join(', '),
  };
}

/**
 * Serializes results as CSV text (BOM, header row, semicolon delimiter)
 */
export function stringifyReport(results: readonly MatchResult[]): string {
  return stringify(results.map(toReportRow), {
    bom: true,
    header: true,
    columns: [...REPORT_COLUMNS],
    delimiter: ';',
  });
}

/**
 * Writes the CSV report, creating the parent directory when needed
 */
export async function writeCsvReport(
  results: readonly MatchResult[],
  outputPath: string
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, stringifyReport(results), 'utf8');

  logger.info(`CSV report written: ${outputPath} (${results.length} rows)`);
}

// ============================================
// HTML
// ============================================

/** Event columns highlighted for each issue */
const ISSUE_COLUMNS: Record<IssueCode, readonly ReportColumn[]> = {
  'dob-mob-swap': ['Event_DoB', 'Event_MoB'],
  'dob-mismatch': ['Event_DoB'],
  'mob-mismatch': ['Event_MoB'],
  'sex-mismatch': ['Event_Sex'],
  'nationality-mismatch': ['Event_Association'],
  'birth-year-mismatch': ['Event_YoB'],
};

const HTML_STYLE = [
  'body { font-family: sans-serif; margin: 2em; }',
  'table { border-collapse: collapse; font-size: 0.9em; }',
  'th, td { border: 1px solid #ccc; padding: 0.25em 0.5em; }',
  'th { background: #f0f0f0; }',
  '.stats td { border: none; }',
  '.tier-none { background: #fbe9e7; }',
  'td.issue { background: #ffe082; font-weight: bold; }',
];

/**
 * Escapes text for use in HTML element content and attribute values
 *
 * @example
 * escapeHtml('<b>O\'Neil & Co</b>') // "&lt;b&gt;O&#39;Neil &amp; Co&lt;/b&gt;"
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const renderRow = (result: MatchResult): string => {
  const row = toReportRow(result);
  const flagged = new Set(result.issues.flatMap((issue) => ISSUE_COLUMNS[issue]));
  const cells = REPORT_COLUMNS.map((column) => {
    const open = flagged.has(column) ? '<td class="issue">' : '<td>';
    return `${open}${escapeHtml(row[column])}</td>`;
  });

  // NAME_SWAP → tier-name-swap
  const tierClass = `tier-${result.outcome.tier.toLowerCase().replace('_', '-')}`;

  return `<tr class="${tierClass}">${cells.join('')}</tr>`;
};

/**
 * Renders results as a standalone HTML page: title, statistics, then one
 * table row per event record with issue-related cells highlighted
 */
export function renderHtmlReport(results: readonly MatchResult[], eventName: string): string {
  const title = escapeHtml(`Match report: ${eventName}`);
  const stats = summaryEntries(computeStats(results)).map(
    ([label, value]) => `<tr><td>${escapeHtml(label)}</td><td>${value}</td></tr>`
  );
  const header = REPORT_COLUMNS.map((column) => `<th>${column}</th>`).join('');

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    `<style>${HTML_STYLE.join(' ')}</style>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    '<table class="stats">',
    ...stats,
    '</table>',
    '<table class="results">',
    `<thead><tr>${header}</tr></thead>`,
    '<tbody>',
    ...results.map(renderRow),
    '</tbody>',
    '</table>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * Writes the HTML report, creating the parent directory when needed
 */
export async function writeHtmlReport(
  results: readonly MatchResult[],
  outputPath: string,
  eventName: string
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, renderHtmlReport(results, eventName), 'utf8');

  logger.info(`HTML report written: ${outputPath}`);
}

// ============================================
// Statistics
// ============================================

/**
 * Counts results per tier and per issue
 */
export function computeStats(results: readonly MatchResult[]): MatchStats {
  const tiers: Record<MatchTier, number> = { EXACT: 0, NAME_SWAP: 0, FUZZY: 0, NONE: 0 };
  const issues: Record<IssueCode, number> = {
    'dob-mob-swap': 0,
    'dob-mismatch': 0,
    'mob-mismatch': 0,
    'sex-mismatch': 0,
    'nationality-mismatch': 0,
    'birth-year-mismatch': 0,
  };
  let withIssues = 0;

  for (const result of results) {
    tiers[result.outcome.tier] += 1;
    for (const issue of result.issues) {
      issues[issue] += 1;
    }
    if (result.issues.length > 0) {
      withIssues += 1;
    }
  }

  return { total: results.length, tiers, issues, withIssues };
}

/**
 * Labelled counts shared by the terminal summary and the HTML report
 */
export function summaryEntries(stats: MatchStats): Array<[string, number]> {
  return [
    ['Event records:', stats.total],
    ['Exact matches:', stats.tiers.EXACT],
    ['Name swaps:', stats.tiers.NAME_SWAP],
    ['Fuzzy matches:', stats.tiers.FUZZY],
    ['DoB/MoB swapped:', stats.issues['dob-mob-swap']],
    ['No match found:', stats.tiers.NONE],
    ['Records with issues:', stats.withIssues],
    ['  - Day of birth:', stats.issues['dob-mismatch']],
    ['  - Month of birth:', stats.issues['mob-mismatch']],
    ['  - Year of birth:', stats.issues['birth-year-mismatch']],
    ['  - Nationality:', stats.issues['nationality-mismatch']],
    ['  - Sex:', stats.issues['sex-mismatch']],
  ];
}

/**
 * Summary lines for the terminal, labels padded to a common width
 */
export function formatSummary(stats: MatchStats): string[] {
  return summaryEntries(stats).map(
    ([label, value]) => `${label.padEnd(26)}${String(value).padStart(5)}`
  );
}

/**
 * Prints the summary box for one event file
 */
export function printSummary(results: readonly MatchResult[], eventName: string): void {
  Logging.box(`Match report: ${eventName}`, formatSummary(computeStats(results)));
}

export default {
  toReportRow,
  stringifyReport,
  writeCsvReport,
  escapeHtml,
  renderHtmlReport,
  writeHtmlReport,
  computeStats,
  summaryEntries,
  formatSummary,
  printSummary,
};
