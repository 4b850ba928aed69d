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

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/** Level from COGFLOW_LOG_LEVEL, falling back to `info`. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.COGFLOW_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${scope ? ` (${scope})` : ''}:`;
    const sink = msgLevel === 'debug' ? 'log' : msgLevel;
    if (args.length > 0) {
      console[sink](prefix, message, ...args);
    } else {
      console[sink](prefix, message);
    }
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

export const silentLogger: Logger = createLogger('silent');
