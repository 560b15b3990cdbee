/**
 * Console Sink
 * Writes log events to the terminal with colored level tags
 */

import chalk from "chalk";
import type { LogEvent, LogLevel, LogSink } from "../types";

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.dim("[DEBUG]"),
  info: chalk.cyan("[INFO]"),
  warn: chalk.yellow("[WARN]"),
  error: chalk.red("[ERROR]"),
};

export interface ConsoleSinkHooks {
  // Called around each write, e.g. to keep a spinner off the log lines
  beforeWrite?: () => void;
  afterWrite?: () => void;
}

export class ConsoleSink implements LogSink {
  constructor(private hooks: ConsoleSinkHooks = {}) {}

  write(event: LogEvent): void {
    this.hooks.beforeWrite?.();

    const line = `${LEVEL_TAGS[event.level]} ${event.message}`;
    if (event.level === "warn" || event.level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }

    this.hooks.afterWrite?.();
  }
}
