import { parseArgs } from 'util';
import { z } from 'zod';
import { env } from './config';
import { reconcileEventDirectory, reconcileEventFile } from './services/reconciliation.service';
import type { ReconcileOptions } from './services/reconciliation.service';
import type { CliOptions, EventFileReport } from './types';
import { AppError, Logging, logger, readPlayerFile } from './utils';

export const USAGE = `Usage: roster-matcher --ref <file> (--event <file> --output <file> | --event-dir <dir> --output-dir <dir>)
                      [--summary] [--html] [--fuzzy-threshold <0..1>] [--issue-penalty <0..1>]

Options:
  --ref <file>               Reference roster (tab-delimited, UTF-8 or UTF-16LE)
  --event <file>             Event file to check
  --output <file>            Report path for --event
  --event-dir <dir>          Check every *.csv in this directory
  --output-dir <dir>         Report directory for --event-dir (report_<name>.csv)
  --summary                  Print a summary per event file
  --html                     Also write an HTML report next to each CSV report
  --fuzzy-threshold <n>      Minimum name similarity for fuzzy matches (default ${env.FUZZY_THRESHOLD})
  --issue-penalty <n>        Confidence deducted per issue (default ${env.ISSUE_PENALTY})
  -h, --help                 Show this help`;

const unitInterval = (flag: string, fallback: number) =>
  z
    .string()
    .trim()
    .min(1, `${flag} must not be empty`)
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${flag} must be a number` })
        .min(0, `${flag} must be between 0 and 1`)
        .max(1, `${flag} must be between 0 and 1`)
    )
    .optional()
    .transform((value) => value ?? fallback);

const cliSchema = z
  .object({
    ref: z.string({ required_error: '--ref is required' }).min(1, '--ref is required'),
    event: z.string().min(1).optional(),
    eventDir: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    summary: z.boolean().default(false),
    html: z.boolean().default(false),
    fuzzyThreshold: unitInterval('--fuzzy-threshold', env.FUZZY_THRESHOLD),
    issuePenalty: unitInterval('--issue-penalty', env.ISSUE_PENALTY),
  })
  .superRefine((options, ctx) => {
    if (options.event === undefined && options.eventDir === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Either --event or --event-dir must be given',
      });
    }
    if (options.event !== undefined && options.output === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--output is required with --event' });
    }
    if (options.eventDir !== undefined && options.outputDir === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '--output-dir is required with --event-dir',
      });
    }
  });

const readFlags = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        ref: { type: 'string' },
        event: { type: 'string' },
        'event-dir': { type: 'string' },
        output: { type: 'string' },
        'output-dir': { type: 'string' },
        summary: { type: 'boolean' },
        html: { type: 'boolean' },
        'fuzzy-threshold': { type: 'string' },
        'issue-penalty': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    // Unknown flags and missing flag values
    throw AppError.invalidConfig(error instanceof Error ? error.message : String(error));
  }
};

/**
 * Parses and validates command line arguments
 *
 * @throws AppError (INVALID_CONFIG) on unknown flags or invalid combinations
 *
 * @example
 * parseCliArgs(['--ref', 'ref.csv', '--event', 'open.csv', '--output', 'out.csv'])
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = readFlags(argv);

  const parsed = cliSchema.safeParse({
    ref: values.ref,
    event: values.event,
    eventDir: values['event-dir'],
    output: values.output,
    outputDir: values['output-dir'],
    summary: values.summary,
    html: values.html,
    fuzzyThreshold: values['fuzzy-threshold'],
    issuePenalty: values['issue-penalty'],
  });

  if (!parsed.success) {
    throw AppError.invalidConfig(parsed.error.errors.map((err) => err.message).join('; '));
  }

  return parsed.data;
}

/**
 * Runs one matcher invocation and returns the process exit code
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }

  try {
    const options = parseCliArgs(argv);
    const { players: references } = await readPlayerFile(options.ref);

    const reconcileOptions: ReconcileOptions = {
      match: { fuzzyThreshold: options.fuzzyThreshold, issuePenalty: options.issuePenalty },
      summary: options.summary,
      html: options.html,
    };

    let reports: EventFileReport[];
    // A single event file wins when both modes are given
    if (options.event !== undefined && options.output !== undefined) {
      reports = [
        await reconcileEventFile(references, options.event, options.output, reconcileOptions),
      ];
    } else if (options.eventDir !== undefined && options.outputDir !== undefined) {
      reports = await reconcileEventDirectory(
        references,
        options.eventDir,
        options.outputDir,
        options.ref,
        reconcileOptions
      );
    } else {
      throw AppError.invalidConfig('Either --event or --event-dir must be given');
    }

    const skipped = reports.reduce((sum, report) => sum + report.skippedRows, 0);
    Logging.success(
      `${reports.length} event file(s) processed` +
        (skipped > 0 ? `, ${skipped} row(s) skipped` : '')
    );
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message);
      return error.exitCode;
    }

    logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    return 1;
  }
}

export default runCli;
