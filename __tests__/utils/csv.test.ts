/**
 * Tests for the Player File Loader
 *
 * - Encoding detection (UTF-8, UTF-16LE with BOM)
 * - Header validation
 * - Birth field parsing
 * - Row validation and skipping
 */

import { join } from 'path';
import { tmpdir } from 'os';
import {
  decodePlayerFile,
  detectEncoding,
  parseBirthField,
  parsePlayerCsv,
  parseRow,
  readPlayerFile,
  validateCsvHeaders,
  type PlayerCsvRow,
} from '../../src/utils/csv';
import { AppError } from '../../src/utils/AppError';

describe('Player File Utilities', () => {
  const HEADER = 'Extern ID\tLast Name\tFirst Name\tSex\tAssociation\tDoB\tMoB\tYoB';

  // ============================================
  // Decoding
  // ============================================
  describe('detectEncoding', () => {
    it('should detect UTF-16LE by its BOM', () => {
      expect(detectEncoding(Buffer.from([0xff, 0xfe, 0x41, 0x00]))).toBe('utf16le');
    });

    it('should default to UTF-8', () => {
      expect(detectEncoding(Buffer.from('Extern ID', 'utf8'))).toBe('utf8');
      expect(detectEncoding(Buffer.alloc(0))).toBe('utf8');
    });
  });

  describe('decodePlayerFile', () => {
    it('should decode UTF-16LE and strip the BOM', () => {
      const content = Buffer.concat([
        Buffer.from([0xff, 0xfe]),
        Buffer.from('Müller\tJan', 'utf16le'),
      ]);

      expect(decodePlayerFile(content)).toBe('Müller\tJan');
    });

    it('should strip a UTF-8 BOM', () => {
      expect(decodePlayerFile(Buffer.from('\uFEFFExtern ID', 'utf8'))).toBe('Extern ID');
    });

    it('should decode plain UTF-8', () => {
      expect(decodePlayerFile(Buffer.from('Müller', 'utf8'))).toBe('Müller');
    });
  });

  // ============================================
  // Header validation
  // ============================================
  describe('validateCsvHeaders', () => {
    it('should pass with all required columns', () => {
      const result = validateCsvHeaders(HEADER.split('\t'));

      expect(result.valid).toBe(true);
      expect(result.missing).toHaveLength(0);
    });

    it('should pass with extra columns', () => {
      const result = validateCsvHeaders([...HEADER.split('\t'), 'Club']);

      expect(result.valid).toBe(true);
    });

    it('should normalize whitespace in headers', () => {
      const headers = HEADER.split('\t').map((header) => ` ${header.replace(' ', '  ')} `);

      expect(validateCsvHeaders(headers).valid).toBe(true);
    });

    it('should list missing columns', () => {
      const headers = HEADER.split('\t').filter((header) => header !== 'Sex' && header !== 'YoB');
      const result = validateCsvHeaders(headers);

      expect(result.valid).toBe(false);
      expect(result.missing).toEqual(['Sex', 'YoB']);
    });
  });

  // ============================================
  // Birth field parsing
  // ============================================
  describe('parseBirthField', () => {
    it('should parse whole numbers', () => {
      expect(parseBirthField('12')).toBe(12);
      expect(parseBirthField(' 1990 ')).toBe(1990);
    });

    it('should treat empty values as absent', () => {
      expect(parseBirthField('')).toBeNull();
      expect(parseBirthField('   ')).toBeNull();
      expect(parseBirthField(undefined)).toBeNull();
    });

    it('should reject non-integers', () => {
      expect(parseBirthField('abc')).toBeUndefined();
      expect(parseBirthField('12.5')).toBeUndefined();
      expect(parseBirthField('1e3')).toBeUndefined();
    });
  });

  // ============================================
  // Row parsing
  // ============================================
  describe('parseRow', () => {
    const createRow = (overrides: PlayerCsvRow = {}): PlayerCsvRow => ({
      'Extern ID': '1001',
      'Last Name': ' Müller ',
      'First Name': 'Jan  Ove',
      Sex: 'M',
      Association: 'GER',
      DoB: '12',
      MoB: '5',
      YoB: '1990',
      ...overrides,
    });

    it('should parse a valid row', () => {
      const result = parseRow(createRow(), 2);

      expect(result.success).toBe(true);
      expect(result.rowNumber).toBe(2);
      expect(result.data).toEqual({
        externId: '1001',
        lastName: 'Müller',
        firstName: 'Jan Ove',
        sex: 'M',
        association: 'GER',
        dob: 12,
        mob: 5,
        yob: 1990,
      });
    });

    it('should keep empty birth fields as null', () => {
      const result = parseRow(createRow({ DoB: '', MoB: '', YoB: '' }), 2);

      expect(result.success).toBe(true);
      expect(result.data?.dob).toBeNull();
      expect(result.data?.mob).toBeNull();
      expect(result.data?.yob).toBeNull();
    });

    it('should fail on a non-numeric birth field', () => {
      const result = parseRow(createRow({ MoB: 'May' }), 7);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Invalid MoB: "May"');
      expect(result.rowNumber).toBe(7);
    });

    it('should default missing cells to empty strings', () => {
      const result = parseRow({ 'Last Name': 'Muster', 'First Name': 'Max' }, 2);

      expect(result.data).toEqual({
        externId: '',
        lastName: 'Muster',
        firstName: 'Max',
        sex: '',
        association: '',
        dob: null,
        mob: null,
        yob: null,
      });
    });
  });

  // ============================================
  // File parsing
  // ============================================
  describe('parsePlayerCsv', () => {
    it('should parse rows and skip invalid ones', () => {
      const content = [
        HEADER,
        '1\tMüller\tJan\tM\tGER\t12\t5\t1990',
        '\tSmith\tAnna\tW\tENG\t\t\t',
        '3\tDoe\tJohn\tM\tUSA\tx\t1\t1980',
      ].join('\n');

      const result = parsePlayerCsv(content, 'event.csv');

      expect(result.players).toHaveLength(2);
      expect(result.players[1]).toEqual({
        externId: '',
        lastName: 'Smith',
        firstName: 'Anna',
        sex: 'W',
        association: 'ENG',
        dob: null,
        mob: null,
        yob: null,
      });
      expect(result.errors).toEqual([{ rowNumber: 4, error: 'Invalid DoB: "x"' }]);
      expect(result.stats).toEqual({ total: 3, valid: 2, invalid: 1 });
    });

    it('should accept columns in any order', () => {
      const content = [
        'YoB\tMoB\tDoB\tAssociation\tSex\tFirst Name\tLast Name\tExtern ID',
        '1990\t5\t12\tGER\tM\tMax\tMuster\t42',
      ].join('\r\n');

      const result = parsePlayerCsv(content);

      expect(result.players[0]).toEqual({
        externId: '42',
        lastName: 'Muster',
        firstName: 'Max',
        sex: 'M',
        association: 'GER',
        dob: 12,
        mob: 5,
        yob: 1990,
      });
    });

    it('should skip empty lines', () => {
      const content = `${HEADER}\n\n1\tMuster\tMax\tM\tGER\t12\t5\t1990\n`;

      expect(parsePlayerCsv(content).stats).toEqual({ total: 1, valid: 1, invalid: 0 });
    });

    it('should return no players for a header-only file', () => {
      expect(parsePlayerCsv(HEADER).players).toEqual([]);
    });

    it('should throw on missing columns', () => {
      const content = 'Extern ID\tLast Name\tFirst Name\tAssociation\tDoB\tMoB\n';

      expect(() => parsePlayerCsv(content, 'ref.csv')).toThrow(
        'Missing columns in ref.csv: Sex, YoB'
      );
    });

    it('should throw on an empty file', () => {
      expect(() => parsePlayerCsv('', 'ref.csv')).toThrow(
        'File ref.csv is empty or has no header row'
      );
    });
  });

  describe('readPlayerFile', () => {
    it('should throw a NOT_FOUND AppError for a missing file', async () => {
      const missing = join(tmpdir(), 'roster-matcher-does-not-exist.csv');

      await expect(readPlayerFile(missing)).rejects.toBeInstanceOf(AppError);
      await expect(readPlayerFile(missing)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: `File not found: ${missing}`,
      });
    });
  });
});
