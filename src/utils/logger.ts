/**
 * Logger
 *
 * Every module gets its own child logger so log lines carry the module name:
 *
 *   const logger = createModuleLogger('retriever');
 *   logger.info('Retrieved 3 results', { query });
 *   // 2024-05-01T10:00:00.000Z info [retriever] Retrieved 3 results {"query":"..."}
 *
 * The level comes from LOG_LEVEL. `silent` mutes every transport.
 */

import { createLogger, format, transports, type Logger } from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? 'info';
}

const lineFormat = format.printf(({ timestamp, level, message, module, ...meta }) => {
  const tag = typeof module === 'string' ? ` [${module}]` : '';
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}${tag} ${String(message)}${extra}`;
});

const initialLevel = parseLogLevel(process.env.LOG_LEVEL);

const rootLogger: Logger = createLogger({
  level: initialLevel === 'silent' ? 'error' : initialLevel,
  silent: initialLevel === 'silent',
  format: format.combine(format.timestamp(), format.errors({ stack: true }), lineFormat),
  transports: [new transports.Console({ stderrLevels: ['error', 'warn'] })],
});

/**
 * Create a logger tagged with a module name.
 */
export function createModuleLogger(module: string): Logger {
  return rootLogger.child({ module });
}

/**
 * Change the level of every module logger at runtime.
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.silent = level === 'silent';
  if (level !== 'silent') {
    rootLogger.level = level;
  }
}
