/**
 * Logging contract accepted by the engine and the state manager.
 * Anything with these four methods works, including `console`.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const write =
  (fn: (...args: unknown[]) => void) =>
  (message: string, meta?: Record<string, unknown>): void => {
    if (meta) fn(`[rule-flow] ${message}`, meta);
    else fn(`[rule-flow] ${message}`);
  };

/**
 * Console-backed logger. Debug output is dropped unless `RULE_FLOW_DEBUG` is set.
 */
export const consoleLogger: Logger = {
  debug: (message, meta) => {
    if (process.env.RULE_FLOW_DEBUG) write(console.debug)(message, meta);
  },
  info: write(console.info),
  warn: write(console.warn),
  error: write(console.error),
};

/** Logger that discards everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
