/**
 * Output handlers for log records.
 *
 * Console output is human-readable; file output is one JSON object per line
 * in <logDir>/logtune-YYYY-MM-DD.jsonl.
 */
import fs from "node:fs";
import path from "node:path";
import { STANDARD_LEVELS } from "./levels.js";
import type { Formatter, Handler, LogRecord } from "./types.js";

/** `[INFO] app.net.server.accept - message` */
export function defaultFormat(record: LogRecord): string {
  return `[${record.levelName}] ${record.name}.${record.functionName} - ${record.msg}`;
}

/** `[INFO    ][12:30:01.250] message [app.net.server.accept]` */
export function verboseFormat(record: LogRecord): string {
  const time = record.ts.slice(11, 23);
  return `[${record.levelName.padEnd(8)}][${time}] ${record.msg} [${record.name}.${record.functionName}]`;
}

export const FORMATS = {
  default: defaultFormat,
  verbose: verboseFormat,
} as const satisfies Record<string, Formatter>;

export type FormatName = keyof typeof FORMATS;

export function isFormatName(value: string): value is FormatName {
  return Object.hasOwn(FORMATS, value);
}

export interface ConsoleHandlerOptions {
  /** Defaults to NOTSET: everything the logger lets through is written. */
  level?: number;
  format?: Formatter;
}

export class ConsoleHandler implements Handler {
  level: number;
  private readonly format: Formatter;

  constructor(options: ConsoleHandlerOptions = {}) {
    this.level = options.level ?? STANDARD_LEVELS.NOTSET;
    this.format = options.format ?? defaultFormat;
  }

  handle(record: LogRecord): void {
    const line = this.format(record);

    if (record.level >= STANDARD_LEVELS.ERROR) {
      console.error(line);
    } else if (record.level >= STANDARD_LEVELS.WARNING) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export interface FileHandlerOptions {
  logDir: string;
  level?: number;
}

export class FileHandler implements Handler {
  level: number;
  private readonly logDir: string;
  private logFilePath: string | null = null;
  private failed = false;

  constructor(options: FileHandlerOptions) {
    this.logDir = options.logDir;
    this.level = options.level ?? STANDARD_LEVELS.NOTSET;
  }

  handle(record: LogRecord): void {
    if (this.failed) return;

    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = new Date().toISOString().slice(0, 10);
        this.logFilePath = path.join(this.logDir, `logtune-${date}.jsonl`);
      }
      fs.appendFileSync(this.logFilePath, JSON.stringify(record) + "\n");
    } catch (error: unknown) {
      // Reported once; later records are dropped.
      this.failed = true;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[logtune] Cannot write log file in ${this.logDir}: ${reason}`);
    }
  }
}
