/**
 * Tests for the command line surface
 */

import { parseCliArgs, runCli } from '../src/cli';
import { AppError } from '../src/utils/AppError';

describe('parseCliArgs', () => {
  const single = ['--ref', 'ref.csv', '--event', 'open.csv', '--output', 'report.csv'];

  it('should parse single-file mode with defaults', () => {
    expect(parseCliArgs(single)).toMatchObject({
      ref: 'ref.csv',
      event: 'open.csv',
      output: 'report.csv',
      summary: false,
      html: false,
      fuzzyThreshold: 0.85,
      issuePenalty: 0.05,
    });
  });

  it('should parse batch mode', () => {
    const options = parseCliArgs([
      '--ref',
      'ref.csv',
      '--event-dir',
      'events',
      '--output-dir',
      'reports',
      '--summary',
    ]);

    expect(options.eventDir).toBe('events');
    expect(options.outputDir).toBe('reports');
    expect(options.summary).toBe(true);
  });

  it('should parse numeric options', () => {
    const options = parseCliArgs([
      ...single,
      '--fuzzy-threshold',
      '0.9',
      '--issue-penalty',
      '0.1',
    ]);

    expect(options.fuzzyThreshold).toBe(0.9);
    expect(options.issuePenalty).toBe(0.1);
  });

  it('should parse the HTML report flag', () => {
    expect(parseCliArgs([...single, '--html']).html).toBe(true);
  });

  it('should reject an empty threshold instead of reading it as 0', () => {
    expect(() => parseCliArgs([...single, '--fuzzy-threshold', ''])).toThrow(
      '--fuzzy-threshold must not be empty'
    );
  });

  it('should reject a blank penalty', () => {
    expect(() => parseCliArgs([...single, '--issue-penalty', ' '])).toThrow(
      '--issue-penalty must not be empty'
    );
  });

  it('should reject a threshold out of range', () => {
    expect(() => parseCliArgs([...single, '--fuzzy-threshold', '2'])).toThrow(
      '--fuzzy-threshold must be between 0 and 1'
    );
  });

  it('should reject a non-numeric threshold', () => {
    expect(() => parseCliArgs([...single, '--fuzzy-threshold', 'high'])).toThrow(
      '--fuzzy-threshold must be a number'
    );
  });

  it('should require an event source', () => {
    expect(() => parseCliArgs(['--ref', 'ref.csv'])).toThrow(
      'Either --event or --event-dir must be given'
    );
  });

  it('should require --output with --event', () => {
    expect(() => parseCliArgs(['--ref', 'ref.csv', '--event', 'open.csv'])).toThrow(
      '--output is required with --event'
    );
  });

  it('should require --output-dir with --event-dir', () => {
    expect(() => parseCliArgs(['--ref', 'ref.csv', '--event-dir', 'events'])).toThrow(
      '--output-dir is required with --event-dir'
    );
  });

  it('should require --ref', () => {
    expect(() => parseCliArgs(['--event', 'open.csv', '--output', 'report.csv'])).toThrow(
      '--ref is required'
    );
  });

  it('should reject unknown options as INVALID_CONFIG', () => {
    expect(() => parseCliArgs([...single, '--verbose'])).toThrow(AppError);
  });
});

describe('runCli', () => {
  it('should print usage and exit 0 for --help', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(runCli(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledTimes(1);

    log.mockRestore();
  });

  it('should exit 2 on invalid options', async () => {
    await expect(runCli(['--ref', 'ref.csv'])).resolves.toBe(2);
  });

  it('should exit 4 when the reference file does not exist', async () => {
    await expect(
      runCli(['--ref', 'missing-ref.csv', '--event', 'open.csv', '--output', 'report.csv'])
    ).resolves.toBe(4);
  });
});
