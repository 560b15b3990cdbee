/**
 * Logger Utility
 * Emits leveled events to every attached sink
 */

import { LOG_LEVELS } from "../types";
import type { LogEvent, LogLevel, LogSink } from "../types";

export function isLogLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sinks: LogSink[] = [],
  ) {}

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  debug(message: string, recordId?: string): void {
    this.log("debug", message, recordId);
  }

  info(message: string, recordId?: string): void {
    this.log("info", message, recordId);
  }

  warn(message: string, recordId?: string): void {
    this.log("warn", message, recordId);
  }

  error(message: string, recordId?: string): void {
    this.log("error", message, recordId);
  }

  log(level: LogLevel, message: string, recordId?: string): void {
    if (!isLogLevelEnabled(level, this.level)) return;

    const event: LogEvent = { level, message, timestamp: new Date() };
    if (recordId) event.recordId = recordId;

    for (const sink of this.sinks) {
      sink.write(event);
    }
  }

  /**
   * Flush and release every sink that holds a resource
   *
   * Every sink is closed even when an earlier one fails.
   *
   * @throws the first failure once all sinks have been closed
   */
  async close(): Promise<void> {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        await sink.close?.();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }
}
