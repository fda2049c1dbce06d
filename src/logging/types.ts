/** A single log event, as handed to filters and handlers. */
export interface LogRecord {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Dotted name of the logger that emitted the record. */
  name: string;
  level: number;
  levelName: string;
  /** Name of the function the log call was made from. */
  functionName: string;
  msg: string;
}

/** Record-level predicate attached to a logger; `false` drops the record. */
export interface RecordFilter {
  filter(record: LogRecord): boolean;
}

export interface Handler {
  /** Minimum level this handler writes. */
  level: number;
  handle(record: LogRecord): void;
}

export type Formatter = (record: LogRecord) => string;
