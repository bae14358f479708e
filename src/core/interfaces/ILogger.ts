export type LogContext = Record<string, unknown>;

/**
 * Logging sink. Implementations must never throw into the caller.
 */
export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}
