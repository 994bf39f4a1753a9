/**
 * Minimal logging surface. The default writes to the console the same way
 * the prover always has; tests and embedders pass `silentLogger` or their own.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  return {
    debug: (message, ...args) => {
      if (options.debug) console.debug(message, ...args);
    },
    info: (message, ...args) => console.log(message, ...args),
    warn: (message, ...args) => console.warn(message, ...args),
    error: (message, ...args) => console.error(message, ...args),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
