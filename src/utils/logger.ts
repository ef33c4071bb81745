/**
 * @fileoverview Console logger with a debug toggle and scoped prefixes
 * @description debug/info/warn output is gated behind the debug flag so a
 * host editor stays quiet by default; errors always print. The flag starts
 * from TIERED_UNDO_DEBUG and can be flipped at run time.
 */

type LogArgs = unknown[];

let debugOutputEnabled: boolean = process.env.TIERED_UNDO_DEBUG === '1';

function withScope(scope: string | null, args: LogArgs): LogArgs {
  return scope ? [`[${scope}]`, ...args] : args;
}

/**
 * Logger interface, compatible with the common console-like logging libraries
 */
interface Logger {
  debug(...args: LogArgs): void;
  info(...args: LogArgs): void;
  warn(...args: LogArgs): void;
  error(...args: LogArgs): void;
  setDebug(enable: boolean): void;
  isDebugEnabled(): boolean;
  scope(name: string): Logger;
}

function createLogger(scope: string | null = null): Logger {
  return {
    debug(...args: LogArgs): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.log(...withScope(scope, args));
      }
    },
    info(...args: LogArgs): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.info(...withScope(scope, args));
      }
    },
    warn(...args: LogArgs): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.warn(...withScope(scope, args));
      }
    },
    error(...args: LogArgs): void {
      // eslint-disable-next-line no-console
      console.error(...withScope(scope, args));
    },
    setDebug(enable: boolean): void {
      debugOutputEnabled = enable;
    },
    isDebugEnabled(): boolean {
      return debugOutputEnabled;
    },
    scope(name: string): Logger {
      return createLogger(scope ? `${scope}:${name}` : name);
    }
  };
}

/**
 * Default logger instance
 */
const logger: Logger = createLogger();

export {
  logger,
  createLogger,
  type Logger
};

export default logger;
