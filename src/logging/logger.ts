/**
 * Hierarchical loggers.
 *
 * Loggers are named with dotted paths and form a tree under a single root.
 * A logger without its own level inherits the nearest ancestor's. Records
 * are checked against the emitting logger's level and filters, then handed
 * to the handlers of that logger and every ancestor.
 */
import { callerFunctionName } from "./caller.js";
import { LevelTable, STANDARD_LEVELS } from "./levels.js";
import type { Handler, LogRecord, RecordFilter } from "./types.js";

export const ROOT_LOGGER_NAME = "root";

export class Logger {
  readonly name: string;
  readonly parent: Logger | null;
  /** Whether records continue to the parent's handlers. */
  propagate = true;
  private readonly registry: LoggerRegistry;
  private ownLevel: number = STANDARD_LEVELS.NOTSET;
  private readonly filterList: RecordFilter[] = [];
  private readonly handlerList: Handler[] = [];

  constructor(name: string, parent: Logger | null, registry: LoggerRegistry) {
    this.name = name;
    this.parent = parent;
    this.registry = registry;
  }

  /** The level set on this logger itself (NOTSET if inherited). */
  get level(): number {
    return this.ownLevel;
  }

  setLevel(level: number): void {
    this.ownLevel = level;
  }

  getEffectiveLevel(): number {
    let current: Logger | null = this;
    while (current) {
      if (current.ownLevel !== STANDARD_LEVELS.NOTSET) {
        return current.ownLevel;
      }
      current = current.parent;
    }
    return STANDARD_LEVELS.NOTSET;
  }

  isEnabledFor(level: number): boolean {
    return level >= this.getEffectiveLevel();
  }

  get filters(): readonly RecordFilter[] {
    return this.filterList;
  }

  addFilter(filter: RecordFilter): void {
    if (!this.filterList.includes(filter)) {
      this.filterList.push(filter);
    }
  }

  removeFilter(filter: RecordFilter): void {
    const index = this.filterList.indexOf(filter);
    if (index !== -1) {
      this.filterList.splice(index, 1);
    }
  }

  get handlers(): readonly Handler[] {
    return this.handlerList;
  }

  addHandler(handler: Handler): void {
    if (!this.handlerList.includes(handler)) {
      this.handlerList.push(handler);
    }
  }

  removeHandler(handler: Handler): void {
    const index = this.handlerList.indexOf(handler);
    if (index !== -1) {
      this.handlerList.splice(index, 1);
    }
  }

  /** Logger for `<this.name>.<suffix>`, created if needed. */
  getChild(suffix: string): Logger {
    const name = this.parent === null ? suffix : `${this.name}.${suffix}`;
    return this.registry.getLogger(name);
  }

  // Arrow fields: callable detached from the logger.
  critical = (msg: string): void => {
    this.emit(STANDARD_LEVELS.CRITICAL, msg, callerFunctionName(this.critical));
  };

  error = (msg: string): void => {
    this.emit(STANDARD_LEVELS.ERROR, msg, callerFunctionName(this.error));
  };

  warning = (msg: string): void => {
    this.emit(STANDARD_LEVELS.WARNING, msg, callerFunctionName(this.warning));
  };

  info = (msg: string): void => {
    this.emit(STANDARD_LEVELS.INFO, msg, callerFunctionName(this.info));
  };

  debug = (msg: string): void => {
    this.emit(STANDARD_LEVELS.DEBUG, msg, callerFunctionName(this.debug));
  };

  /**
   * Log at an arbitrary level. Without `functionName` the caller's name is
   * taken from the stack.
   */
  log = (level: number, msg: string, functionName?: string): void => {
    this.emit(level, msg, functionName ?? callerFunctionName(this.log));
  };

  private emit(level: number, msg: string, functionName: string): void {
    if (!this.isEnabledFor(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      name: this.name,
      level,
      levelName: this.registry.levels.nameOf(level),
      functionName,
      msg,
    };

    for (const filter of this.filterList) {
      if (!filter.filter(record)) return;
    }

    let current: Logger | null = this;
    while (current) {
      for (const handler of current.handlerList) {
        if (record.level >= handler.level) {
          handler.handle(record);
        }
      }
      if (!current.propagate) break;
      current = current.parent;
    }
  }
}

export interface LoggerRegistryOptions {
  /** Level of the root logger. Defaults to WARNING. */
  defaultLevel?: number;
  levels?: LevelTable;
}

/**
 * The tree of named loggers.
 *
 * Created once at startup and passed to whatever needs to look up or adjust
 * loggers.
 */
export class LoggerRegistry {
  readonly levels: LevelTable;
  readonly root: Logger;
  /** The root level the registry started with. */
  readonly defaultLevel: number;
  private readonly loggers = new Map<string, Logger>();

  constructor(options: LoggerRegistryOptions = {}) {
    this.levels = options.levels ?? new LevelTable();
    this.defaultLevel = options.defaultLevel ?? STANDARD_LEVELS.WARNING;
    this.root = new Logger(ROOT_LOGGER_NAME, null, this);
    this.root.setLevel(this.defaultLevel);
  }

  /** Get or create the logger for a dotted name; no name gives the root. */
  getLogger(name?: string): Logger {
    if (!name || name === ROOT_LOGGER_NAME) {
      return this.root;
    }

    const existing = this.loggers.get(name);
    if (existing) return existing;

    const lastDot = name.lastIndexOf(".");
    const parent = lastDot === -1 ? this.root : this.getLogger(name.slice(0, lastDot));
    const logger = new Logger(name, parent, this);
    this.loggers.set(name, logger);
    return logger;
  }

  /** Whether a logger exists for the name, without creating it. */
  has(name: string): boolean {
    return name === ROOT_LOGGER_NAME || this.loggers.has(name);
  }

  /** Names of every non-root logger, in creation order. */
  loggerNames(): string[] {
    return [...this.loggers.keys()];
  }
}
