/**
 * @fileoverview Logger contract and console implementation
 *
 * @module @tessera/core/domain/logging
 *
 * Components accept any {@link ILogger}; plug in pino, winston or a test
 * spy by passing it through the component's `logger` option.
 */

/**
 * Logger interface used by registries and dispatchers
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Unfiltered console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
  /** Prepended to every message, e.g. 'guards' gives "[guards] ..." */
  scope?: string;
}

/**
 * Console logger that drops messages below `level`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', scope: 'events' });
 * logger.debug('dispatching'); // [DEBUG] [events] dispatching
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.scope ? `[${options.scope}] ` : '';

  const write =
    (level: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVEL_ORDER[level] < threshold) {
        return;
      }
      consoleLogger[level](`${prefix}${message}`, ...args);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
