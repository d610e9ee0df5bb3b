/**
 * Run Logger
 *
 * Console-backed logger that can mirror every line into a log file
 * (outputs/pipeline.log). Lines read:
 *   2026-03-01T09:00:00.000Z INFO pipeline.call - Saved call output to ...
 */

import { closeSync, mkdirSync, openSync, writeSync } from "fs";
import path from "path";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger sharing this one's sinks under a different name. */
  child(name: string): Logger;
}

export interface LogEntry {
  level: LogLevel;
  name: string;
  message: string;
}

type LineSink = (level: LogLevel, line: string) => void;

class SinkLogger implements Logger {
  constructor(
    private readonly name: string,
    private readonly sink: LineSink,
  ) {}

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARN", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  child(name: string): Logger {
    return new SinkLogger(name, this.sink);
  }

  private write(level: LogLevel, message: string): void {
    this.sink(level, formatLogLine(new Date(), level, this.name, message));
  }
}

export function formatLogLine(at: Date, level: LogLevel, name: string, message: string): string {
  return `${at.toISOString()} ${level} ${name} - ${message}`;
}

/**
 * Logger writing to the console and, when `logFile` is given, to that file.
 * The file is truncated on open; call `close()` at the end of the run.
 */
export class RunLogger extends SinkLogger {
  private readonly file: { fd: number | null };

  constructor(name: string, logFile?: string) {
    const file: { fd: number | null } = { fd: null };
    super(name, (level, line) => {
      if (level === "ERROR") console.error(line);
      else if (level === "WARN") console.warn(line);
      else console.log(line);
      if (file.fd !== null) writeSync(file.fd, line + "\n");
    });
    if (logFile) {
      mkdirSync(path.dirname(logFile), { recursive: true });
      file.fd = openSync(logFile, "w");
    }
    this.file = file;
  }

  close(): void {
    if (this.file.fd !== null) {
      closeSync(this.file.fd);
      this.file.fd = null;
    }
  }
}

/**
 * Logger that keeps entries in memory. Used by tests and by callers that
 * want to inspect what a run reported.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[];

  constructor(
    private readonly name = "test",
    entries?: LogEntry[],
  ) {
    this.entries = entries ?? [];
  }

  info(message: string): void {
    this.entries.push({ level: "INFO", name: this.name, message });
  }

  warn(message: string): void {
    this.entries.push({ level: "WARN", name: this.name, message });
  }

  error(message: string): void {
    this.entries.push({ level: "ERROR", name: this.name, message });
  }

  child(name: string): Logger {
    return new MemoryLogger(name, this.entries);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}
