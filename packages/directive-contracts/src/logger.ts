/**
 * Logger port.
 *
 * Components take an ILogger in their constructor options instead of
 * reaching for a global; the host application decides where lines go.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const noopLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Console-backed logger with a minimum level. Warnings and errors go to stderr.
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = 'tagwire'): ILogger {
  const write = (lineLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[lineLevel] < LEVEL_PRIORITY[level]) {
      return;
    }
    const line = `[${prefix}] ${lineLevel.toUpperCase().padEnd(5)} ${message}`;
    const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];
    if (lineLevel === 'error' || lineLevel === 'warn') {
      console.error(...args);
    } else {
      console.log(...args);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
