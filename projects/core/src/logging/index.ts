import type { ILogger, LogContext } from "../interfaces/ILogger.js";

const noop = (): void => {};

/**
 * Logger that discards everything. Default for every service.
 */
export const NOOP_LOGGER: ILogger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

/**
 * Adapts the global console, tagging each line with `[prefix]`.
 */
export function createConsoleLogger(
  prefix: string,
  sink: Pick<Console, "debug" | "info" | "warn" | "error"> = console
): ILogger {
  const format = (message: string): string => `[${prefix}] ${message}`;
  const write =
    (method: "debug" | "info" | "warn" | "error") =>
    (message: string, context?: LogContext): void => {
      if (context === undefined) {
        sink[method](format(message));
      } else {
        sink[method](format(message), context);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
