/**
 * Function-scoped record filter.
 *
 * A logger node carries at most one of these; further function-scoped
 * overrides on the same node add names to it. A record passes when its
 * originating function is any of the registered names.
 */
import type { LogRecord, RecordFilter } from "./types.js";

export class FunctionNameFilter implements RecordFilter {
  private readonly names = new Set<string>();

  constructor(functionName: string) {
    this.addFunctionName(functionName);
  }

  addFunctionName(functionName: string): void {
    this.names.add(functionName);
  }

  get functionNames(): ReadonlySet<string> {
    return this.names;
  }

  filter(record: LogRecord): boolean {
    return this.names.has(record.functionName);
  }
}
