/**
 * Player File Loader
 *
 * Reads tab-delimited player files as exported by tournament software.
 *
 * Key features:
 * - Encoding detection by BOM (UTF-16LE with BOM, otherwise UTF-8)
 * - Header validation with clear error messages
 * - Whitespace normalization of headers and values (Unicode spaces included)
 * - Rows with non-numeric birth fields are skipped and reported
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { AppError } from './AppError';
import { logger } from './logger';
import { normalizeWhitespace } from '../matching/normalizeName';
import type { PlayerRecord } from '../matching/types';

// ============================================
// Types
// ============================================

/**
 * Raw row keyed by normalized header name
 */
export type PlayerCsvRow = Partial<Record<string, string>>;

/**
 * Result of parsing a single row
 */
export interface RowParseResult {
  success: boolean;
  data?: PlayerRecord;
  error?: string;
  rowNumber: number;
}

export interface PlayerFileStats {
  total: number;
  valid: number;
  invalid: number;
}

export interface PlayerFile {
  players: PlayerRecord[];
  errors: Array<{ rowNumber: number; error: string }>;
  stats: PlayerFileStats;
}

/**
 * Required columns in every player file
 */
export const REQUIRED_COLUMNS = [
  'Extern ID',
  'Last Name',
  'First Name',
  'Sex',
  'Association',
  'DoB',
  'MoB',
  'YoB',
] as const;

const UTF16LE_BOM = [0xff, 0xfe];
const BYTE_ORDER_MARK = /^\uFEFF/;

// ============================================
// Decoding
// ============================================

/**
 * Detects the file encoding from its first bytes
 */
export function detectEncoding(content: Buffer): BufferEncoding {
  if (content.length >= 2 && content[0] === UTF16LE_BOM[0] && content[1] === UTF16LE_BOM[1]) {
    return 'utf16le';
  }
  return 'utf8';
}

/**
 * Decodes raw file bytes and strips a leading BOM
 */
export function decodePlayerFile(content: Buffer): string {
  return content.toString(detectEncoding(content)).replace(BYTE_ORDER_MARK, '');
}

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = new Set(headers.map(normalizeWhitespace));
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.has(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Parses an optional integer birth field.
 * Empty values are absent (null); anything else must be a whole number.
 *
 * @returns The number, null when empty, undefined when invalid
 */
export function parseBirthField(value: string | undefined): number | null | undefined {
  const trimmed = normalizeWhitespace(value ?? '');
  if (trimmed === '') {
    return null;
  }

  if (!/^-?\d+$/.test(trimmed)) {
    return undefined;
  }

  return parseInt(trimmed, 10);
}

/**
 * Parses and validates a single row
 */
export function parseRow(row: PlayerCsvRow, rowNumber: number): RowParseResult {
  const field = (name: (typeof REQUIRED_COLUMNS)[number]): string =>
    normalizeWhitespace(row[name] ?? '');

  const birth: { dob: number | null; mob: number | null; yob: number | null } = {
    dob: null,
    mob: null,
    yob: null,
  };

  for (const [key, column] of [
    ['dob', 'DoB'],
    ['mob', 'MoB'],
    ['yob', 'YoB'],
  ] as const) {
    const parsed = parseBirthField(row[column]);
    if (parsed === undefined) {
      return {
        success: false,
        error: `Invalid ${column}: "${row[column] ?? ''}"`,
        rowNumber,
      };
    }
    birth[key] = parsed;
  }

  return {
    success: true,
    data: {
      externId: field('Extern ID'),
      lastName: field('Last Name'),
      firstName: field('First Name'),
      sex: field('Sex'),
      association: field('Association'),
      ...birth,
    },
    rowNumber,
  };
}

// ============================================
// Parsing
// ============================================

/**
 * Parses decoded file content into player records
 *
 * @param content - Decoded, BOM-free file content
 * @param source - File name used in messages
 * @throws AppError (INVALID_INPUT) when the header row is missing or incomplete
 */
export function parsePlayerCsv(content: string, source = '<input>'): PlayerFile {
  const rows: string[][] = parse(content, {
    delimiter: '\t',
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });

  const [headerRow, ...dataRows] = rows;
  if (!headerRow) {
    throw AppError.invalidInput(`File ${source} is empty or has no header row`);
  }

  const validation = validateCsvHeaders(headerRow);
  if (!validation.valid) {
    throw AppError.invalidInput(
      `Missing columns in ${source}: ${[...validation.missing].sort().join(', ')}`
    );
  }

  const headers = headerRow.map(normalizeWhitespace);
  const players: PlayerRecord[] = [];
  const errors: Array<{ rowNumber: number; error: string }> = [];

  dataRows.forEach((cells, index) => {
    // Header is line 1
    const rowNumber = index + 2;
    const row: PlayerCsvRow = {};
    headers.forEach((header, column) => {
      row[header] = cells[column];
    });

    const result = parseRow(row, rowNumber);
    if (result.success && result.data) {
      players.push(result.data);
    } else if (result.error) {
      errors.push({ rowNumber, error: result.error });
      logger.warn(`Row ${rowNumber} in ${source} skipped: ${result.error}`);
    }
  });

  return {
    players,
    errors,
    stats: {
      total: dataRows.length,
      valid: players.length,
      invalid: errors.length,
    },
  };
}

/**
 * Reads a player file from disk
 *
 * @throws AppError (NOT_FOUND) when the file does not exist
 */
export async function readPlayerFile(filePath: string): Promise<PlayerFile> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw AppError.notFound(`File not found: ${filePath}`);
    }
    throw error;
  }

  const result = parsePlayerCsv(decodePlayerFile(content), filePath);
  logger.info(`${result.players.length} players read from ${filePath}`);

  return result;
}

export default {
  readPlayerFile,
  parsePlayerCsv,
  parseRow,
  parseBirthField,
  validateCsvHeaders,
  decodePlayerFile,
  detectEncoding,
};
