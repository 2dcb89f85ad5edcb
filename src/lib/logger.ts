/**
 * Tagged console logging. Debug lines are dropped unless enabled.
 */

type LogArgs = unknown[];

export interface Logger {
  debug: (...args: LogArgs) => void;
  info: (...args: LogArgs) => void;
  warn: (...args: LogArgs) => void;
  error: (...args: LogArgs) => void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (options.debug) console.debug(prefix, ...args);
    },
    info: (...args) => console.info(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
