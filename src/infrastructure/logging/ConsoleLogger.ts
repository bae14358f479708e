import { ILogger, LogContext } from '../../core/interfaces/ILogger.js';

function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ' [unserializable context]';
  }
}

/**
 * Console logger, one line per event: `[Component] message {context}`
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private component: string,
    private debugEnabled: boolean = false
  ) {}

  debug(message: string, context?: LogContext): void {
    if (this.debugEnabled) {
      console.debug(this.line(message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    console.log(this.line(message, context));
  }

  warn(message: string, context?: LogContext): void {
    console.warn(this.line(message, context));
  }

  error(message: string, context?: LogContext): void {
    console.error(this.line(message, context));
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, this.debugEnabled);
  }

  private line(message: string, context?: LogContext): string {
    return `[${this.component}] ${message}${formatContext(context)}`;
  }
}
