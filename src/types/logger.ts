/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const session = new Session({ debug: true, logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const session = new Session({ debug: true, logger: console });
 * ```
 */
export type LogMethod = (msgOrObj: string | object, ...args: unknown[]) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export type LogLevelName = keyof Logger;

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj, ...args) => console.debug(msgOrObj, ...args),
  info: (msgOrObj, ...args) => console.info(msgOrObj, ...args),
  warn: (msgOrObj, ...args) => console.warn(msgOrObj, ...args),
  error: (msgOrObj, ...args) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevelName): Logger {
  const levels: Record<LogLevelName, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  const minLevelNum = levels[minLevel];
  const gate = (level: LogLevelName): LogMethod => (msgOrObj, ...args) => {
    if (levels[level] >= minLevelNum) {
      baseLogger[level](msgOrObj, ...args);
    }
  };

  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}
