import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

const LEVEL_STYLES: Record<LevelName, { color: chalk.Chalk; bright: chalk.Chalk; icon: string }> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const isLevelName = (level: string): level is LevelName => level in LEVEL_STYLES;

// Metadata fields winston adds itself, never printed as context
const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'stack', 'service']);

const formatContext = (info: Record<string, unknown>): string => {
  const context = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.has(key))
  );
  return Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
};

// Console output: colored level, icon and any structured context
const colorizedFormat = printf((info) => {
  const { level, message, timestamp: ts, stack } = info;
  const style = isLevelName(level)
    ? LEVEL_STYLES[level]
    : { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);

  if (typeof stack === 'string') {
    return `${timestampStr} ${style.icon} ${levelStr}\n${chalk.red(stack)}`;
  }

  const text = typeof message === 'string' ? message : JSON.stringify(message);
  return `${timestampStr} ${style.icon} ${levelStr} ${style.bright(text)}${chalk.gray(formatContext(info))}`;
});

// File output: no colors
const fileFormat = printf((info) => {
  const { level, message, timestamp: ts, stack } = info;
  const text = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}]: ${text}${formatContext(info)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'facility-reconciliation' },
  transports: [
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const fileTransportFormat = combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true }),
    fileFormat
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: fileTransportFormat,
    })
  );
  logger.add(
    new winston.transports.File({ filename: 'logs/combined.log', format: fileTransportFormat })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static helpers for one-off console messages (startup banner, upload
 * notices). Library code logs through the winston instance directly.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static success = (args: unknown): void => {
    if (env.NODE_ENV === 'test') return;
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

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
