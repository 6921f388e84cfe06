/**
 * Minimal logger contract used across the engine and the host service.
 * Messages carry a bracketed topic prefix such as `[PERIODS]` or `[CACHE]`.
 */
export interface Logger {
  log(...args: Array<unknown>): void;
  error(...args: Array<unknown>): void;
}

/**
 * Logger writing to the process console
 */
export const consoleLogger: Logger = {
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
};

/**
 * Logger that discards everything (default for pure calculations)
 */
export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined,
};
