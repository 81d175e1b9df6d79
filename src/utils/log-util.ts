import { Console } from 'console';

import { LogLevel } from '../enums';

// The report owns stdout, so every log line goes to stderr.
const logger = new Console({ stdout: process.stderr, stderr: process.stderr });

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['log', LogLevel.LOG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
]);

/**
 * Maps a level name such as `info` to its LogLevel, or undefined if unknown.
 */
export const parseLogLevel = (name: string): LogLevel | undefined =>
  LEVEL_NAMES.get(name.trim().toLowerCase());

let threshold: LogLevel =
  parseLogLevel(process.env.PR_STATS_LOG_LEVEL ?? '') ?? LogLevel.WARN;

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

/**
 * Logs information about different actions taking place to stderr.
 * Messages below the current threshold are dropped.
 *
 * @param functionName - the name of the function where the logging is happening
 * @param logLevel - the severity level of the log
 * @param message - the message parts, joined by spaces
 */
export const log = (
  functionName: string,
  logLevel: LogLevel,
  ...message: unknown[]
) => {
  if (logLevel < threshold) return;

  const output = `${functionName}: ${message.map(String).join(' ')}`;

  if (logLevel === LogLevel.INFO) {
    logger.info(output);
  } else if (logLevel === LogLevel.WARN) {
    logger.warn(output);
  } else if (logLevel === LogLevel.ERROR) {
    logger.error(output);
  } else {
    logger.log(output);
  }
};
