export type LogFn = (...args: unknown[]) => void;

export interface PineLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export interface ConsoleLoggerOptions {
  /** Emit `debug` lines. Off unless requested. */
  debug?: boolean;
}

export function createConsoleLogger(tag: string, options: ConsoleLoggerOptions = {}): PineLogger {
  const prefix = `[${tag}]`;
  return {
    debug: options.debug ? (...args) => console.log(prefix, ...args) : () => undefined,
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export const silentLogger: PineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
