/**
 * Reconciliation Service for the Player Matcher
 *
 * Orchestrates one run: load event records, match them against the
 * reference roster, write the report and optionally print a summary.
 *
 * Two modes:
 * - single event file → one report
 * - event directory → one report_<name>.csv per *.csv file (batch)
 *
 * With the html option every CSV report gets an HTML twin beside it.
 */

import { readdir } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { matchAll } from '../matching';
import type { MatchOptions, PlayerRecord } from '../matching/types';
import type { EventFileReport } from '../types';
import { logger, readPlayerFile } from '../utils';
import { printSummary, writeCsvReport, writeHtmlReport } from './report.service';

// ============================================
// Types
// ============================================

export interface ReconcileOptions {
  match: MatchOptions;
  /** Print a summary box per event file */
  summary: boolean;
  /** Also write an HTML report beside each CSV report */
  html: boolean;
}

// ============================================
// Helpers
// ============================================

/**
 * Report path for an event file in batch mode
 *
 * @example
 * reportPathFor('out', 'events/open2025.csv') // Returns: "out/report_open2025.csv"
 */
export function reportPathFor(outputDir: string, eventPath: string): string {
  return join(outputDir, `report_${basename(eventPath, extname(eventPath))}.csv`);
}

/**
 * HTML report path for a CSV report path: same directory and name, .html extension
 *
 * @example
 * htmlPathFor('out/report_open2025.csv') // Returns: "out/report_open2025.html"
 */
export function htmlPathFor(outputPath: string): string {
  return join(dirname(outputPath), `${basename(outputPath, extname(outputPath))}.html`);
}

/**
 * Lists the *.csv files of a directory in name order, leaving out the reference file
 */
export async function listEventFiles(eventDir: string, referencePath: string): Promise<string[]> {
  const referenceResolved = resolve(referencePath);
  const entries = await readdir(eventDir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.csv'))
    .map((entry) => join(eventDir, entry.name))
    .filter((filePath) => resolve(filePath) !== referenceResolved)
    .sort();
}

// ============================================
// Reconciliation
// ============================================

/**
 * Reconciles one event file against the reference roster
 */
export async function reconcileEventFile(
  references: readonly PlayerRecord[],
  eventPath: string,
  outputPath: string,
  options: ReconcileOptions
): Promise<EventFileReport> {
  const { players, stats } = await readPlayerFile(eventPath);
  const results = matchAll(players, references, options.match);

  await writeCsvReport(results, outputPath);

  const htmlPath = options.html ? htmlPathFor(outputPath) : undefined;
  if (htmlPath !== undefined) {
    await writeHtmlReport(results, htmlPath, basename(eventPath));
  }

  if (options.summary) {
    printSummary(results, basename(eventPath));
  }

  return {
    eventPath,
    outputPath,
    ...(htmlPath === undefined ? {} : { htmlPath }),
    resultCount: results.length,
    skippedRows: stats.invalid,
  };
}

/**
 * Reconciles every event file in a directory, one after another
 */
export async function reconcileEventDirectory(
  references: readonly PlayerRecord[],
  eventDir: string,
  outputDir: string,
  referencePath: string,
  options: ReconcileOptions
): Promise<EventFileReport[]> {
  const eventFiles = await listEventFiles(eventDir, referencePath);

  if (eventFiles.length === 0) {
    logger.warn(`No CSV files found in ${eventDir}`);
    return [];
  }

  const reports: EventFileReport[] = [];
  for (const eventPath of eventFiles) {
    logger.info(`Processing ${basename(eventPath)} ...`);
    reports.push(
      await reconcileEventFile(references, eventPath, reportPathFor(outputDir, eventPath), options)
    );
  }

  return reports;
}

export default {
  reconcileEventFile,
  reconcileEventDirectory,
  listEventFiles,
  reportPathFor,
  htmlPathFor,
};
