import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors, splat } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const isLevelName = (level: string): level is LevelName => level in levelColors;

// Fields winston adds on its own; everything else is caller context (batchId, vendor, ...)
const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'stack', 'service']);

const formatContext = (info: Record<string, unknown>): string => {
  const context = Object.entries(info).filter(([key]) => !RESERVED_KEYS.has(key));
  if (context.length === 0) return '';
  return ` ${JSON.stringify(Object.fromEntries(context))}`;
};

// Custom colorized format for console output
const colorizedFormat = printf((info) => {
  const { level, message, timestamp: ts, stack } = info;
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const brightColor = isLevelName(level) ? levelBrightColors[level] : chalk.whiteBright;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);
  const context = chalk.gray(formatContext(info));

  // Format the message - use bright color for strings
  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${icon} ${levelStr} ${formattedMessage}${context}\n${chalk.red(stack)}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}${context}`;
});

// Simple format for file output (no colors)
const fileFormat = printf((info) => {
  const { level, message, timestamp: ts, stack } = info;
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}]: ${body}${formatContext(info)}`;
});

const baseFormat = combine(
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  splat()
);

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'charge-mapping-backend' },
  transports: [
    new winston.transports.Console({
      format: combine(baseFormat, colorizedFormat),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(baseFormat, fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(baseFormat, fileFormat),
    })
  );
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static helpers for one-off startup and maintenance output.
 */
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

  public static http = (args: unknown): void => {
    logger.http(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    const rows = [
      chalk.cyan(`╔${line}╗`),
      chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╠${line}╣`),
      chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╚${line}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(rows.join('\n'));
  };
}

export default logger;
