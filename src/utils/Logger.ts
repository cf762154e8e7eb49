import pino from 'pino';
import { DEFAULT_REDACTION_PATHS } from './redactionPaths';
import { ILogger, LogContext } from './ILogger';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level: LogLevel;
  redactPaths?: string[];
  /**
   * Where log lines go. Defaults to stderr: stdout is reserved for the response.
   */
  destination?: pino.DestinationStream;
}

export class Logger implements ILogger {
  private readonly pino: pino.Logger;
  readonly level: LogLevel;

  constructor(options: LoggerOptions, instance?: pino.Logger) {
    this.level = options.level;
    this.pino =
      instance ??
      pino(
        {
          level: options.level,
          redact: {
            paths: options.redactPaths ?? DEFAULT_REDACTION_PATHS,
            censor: '[REDACTED]',
          },
        },
        options.destination ?? process.stderr
      );
  }

  child(bindings: LogContext): ILogger {
    return new Logger({ level: this.level }, this.pino.child(bindings));
  }

  trace(msg: string, context?: LogContext): void {
    if (context) {
      this.pino.trace(context, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  debug(msg: string, context?: LogContext): void {
    if (context) {
      this.pino.debug(context, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  info(msg: string, context?: LogContext): void {
    if (context) {
      this.pino.info(context, msg);
    } else {
      this.pino.info(msg);
    }
  }

  warn(msg: string, context?: LogContext): void {
    if (context) {
      this.pino.warn(context, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  error(msg: string, context?: LogContext): void {
    if (context) {
      this.pino.error(context, msg);
    } else {
      this.pino.error(msg);
    }
  }
}
