export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Minimal logging seam. Services take an optional logger and stay silent
 * without one.
 */
export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}
