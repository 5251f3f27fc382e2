import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  debug: '🔍',
};

const isLevelName = (level: string): level is LevelName => level in levelColors;

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const brightColor = isLevelName(level) ? levelBrightColors[level] : chalk.whiteBright;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  // Format the message - use bright color for strings
  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${icon} ${levelStr}\n${chalk.red(stack)}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${typeof stack === 'string' ? stack : String(message)}`;
});

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'roster-matcher' },
  transports: [
    // Console transport with colors, on stderr so stdout stays free for the summary
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Logging helpers with console-styled extras for terminal output
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(stringify(args));
  };

  public static error = (args: unknown): void => {
    logger.error(stringify(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  // Box-styled block: title line, then one row per line
  public static box = (title: string, lines: readonly string[]): void => {
    const width = Math.max(49, title.length + 1, ...lines.map((line) => line.length + 1));
    const rule = '═'.repeat(width + 1);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${rule}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(width)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${rule}╣`));
    for (const line of lines) {
      // eslint-disable-next-line no-console
      console.log(chalk.cyan('║') + chalk.white(` ${line.padEnd(width)}`) + chalk.cyan('║'));
    }
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${rule}╝`));
  };
}

export { logger };
export default logger;
