/**
 * Logging provider interface.
 * Wraps external logging services (Axiom, console, etc).
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Extended event for one outbound call to the video platform. */
export interface ApiCallLogEvent extends LogEvent {
  /** Client operation (e.g. search.source, videos.list). */
  operation: string;
  /** Quota units charged for the call. */
  cost: number;
  /** Wall time of the call in milliseconds. */
  durationMs: number;
  success: boolean;
  itemsReturned: number;
  /** Error classification when the call failed. */
  errorKind?: string;
}

export interface ILogProvider {
  /** Enqueue a structured log event for delivery. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /* Convenience methods, all non-blocking. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
