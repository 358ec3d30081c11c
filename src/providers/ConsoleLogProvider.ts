/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes to stdout/stderr.
 */

import { LOG_LEVEL_ORDER, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Drop events below this level. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const prefix = `[${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      const line = `${stamped.timestamp} ${prefix} ${stamped.message}${fieldsStr}`;
      if (stamped.level === 'error' || stamped.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Events at exactly `level`. */
  byLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
