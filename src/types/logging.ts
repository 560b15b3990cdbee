/**
 * Log event types
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEvent {
  level: LogLevel;
  message: string;
  timestamp: Date;
  // Identifier of the record the event is about, when there is one
  recordId?: string;
}

/**
 * Receives every event at or above the logger's level
 */
export interface LogSink {
  write(event: LogEvent): void;
  close?(): Promise<void>;
}
