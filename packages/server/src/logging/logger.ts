import type { LogLevel } from '../config/index.js';

type Fields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields): void;
  child(fields: Fields): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type WritableLevel = Exclude<LogLevel, 'silent'>;

/**
 * Serialize an error for a log line (stack only outside production)
 */
export function errorFields(err: unknown): Fields {
  if (err instanceof Error) {
    return {
      error: err.name,
      message: err.message,
      ...(process.env['NODE_ENV'] !== 'production' && err.stack ? { stack: err.stack } : {}),
    };
  }
  return { error: String(err) };
}

/**
 * Structured JSON logger writing one line per entry to the console
 *
 * Never pass token or code values in fields; log record ids instead.
 */
export function createLogger(level: LogLevel, bindings: Fields = {}): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: WritableLevel, message: string, fields?: Fields) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...bindings,
      ...fields,
    });

    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (fields) => createLogger(level, { ...bindings, ...fields }),
  };
}

/**
 * Logger that drops everything (tests, embedding without logs)
 */
export const silentLogger: Logger = createLogger('silent');
