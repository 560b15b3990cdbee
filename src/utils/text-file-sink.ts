/**
 * Text File Sink
 * Appends one line per log event to a plain-text log file
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "fs/promises";
import { dirname } from "node:path";
import { format } from "date-fns";
import type { LogEvent, LogSink } from "../types";

/**
 * Format an event as `yyyy-MM-dd HH:mm:ss  LEVEL     message`
 */
export function formatLogLine(event: LogEvent): string {
  const timestamp = format(event.timestamp, "yyyy-MM-dd HH:mm:ss");
  return `${timestamp}  ${event.level.toUpperCase().padEnd(8)}  ${event.message}`;
}

export class TextFileSink implements LogSink {
  // First stream error; later writes are dropped and close() reports it
  private failure: Error | undefined;

  private constructor(
    readonly path: string,
    private stream: WriteStream,
  ) {
    stream.on("error", (error) => {
      this.failure ??= error;
    });
  }

  /**
   * @throws when the file cannot be opened for appending
   */
  static async open(path: string): Promise<TextFileSink> {
    await mkdir(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: "a", encoding: "utf-8" });

    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => resolve());
      stream.once("error", reject);
    });

    return new TextFileSink(path, stream);
  }

  write(event: LogEvent): void {
    if (this.failure) return;
    this.stream.write(`${formatLogLine(event)}\n`);
  }

  close(): Promise<void> {
    const failure = this.failure;
    if (failure) {
      return Promise.reject(failure);
    }
    return new Promise((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
