// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

/**
 * Leveled logger writing to stderr so stdout stays free for analysis output.
 * `scope` is rendered as a bracketed tag after the level.
 */
export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: EmittingLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${tag}:`;
    if (args.length > 0) {
      console.error(prefix, message, ...args);
    } else {
      console.error(prefix, message);
    }
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger('silent');
