export type LogContext = Record<string, unknown>;

/**
 * Interface for logging implementations.
 */
export interface ILogger {
  /**
   * Create a child logger whose entries all carry `bindings`.
   */
  child(bindings: LogContext): ILogger;

  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
}
