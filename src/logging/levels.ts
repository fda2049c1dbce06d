/**
 * Logging levels.
 *
 * Levels are ordered numbers; a logger emits a record when the record's
 * level is at least the logger's effective level. NOTSET on a logger means
 * "inherit from the parent".
 */
import { UnknownLevelError } from "../shared/errors.js";

export const STANDARD_LEVELS = {
  CRITICAL: 50,
  ERROR: 40,
  WARNING: 30,
  INFO: 20,
  DEBUG: 10,
  NOTSET: 0,
} as const;

export type StandardLevelName = keyof typeof STANDARD_LEVELS;

/** Extra names that map onto a standard level without becoming its display name. */
const LEVEL_ALIASES: Record<string, number> = {
  FATAL: STANDARD_LEVELS.CRITICAL,
  WARN: STANDARD_LEVELS.WARNING,
};

/**
 * Whether a token is written in upper case (at least one cased character,
 * none of them lower case). Level names are; namespaces are not.
 */
export function isUpperCaseName(token: string): boolean {
  return token !== token.toLowerCase() && token === token.toUpperCase();
}

/** Mapping between level names and level values. */
export class LevelTable {
  private readonly byName = new Map<string, number>();
  private readonly byValue = new Map<number, string>();

  constructor() {
    for (const [name, value] of Object.entries(STANDARD_LEVELS)) {
      this.addLevelName(value, name);
    }
    for (const [alias, value] of Object.entries(LEVEL_ALIASES)) {
      this.byName.set(alias, value);
    }
  }

  /** Register a custom level (or rename an existing value). */
  addLevelName(value: number, name: string): void {
    if (!isUpperCaseName(name)) {
      throw new UnknownLevelError(name, `Level name "${name}" needs to be an upper case string!`);
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new UnknownLevelError(name, `Level "${name}" needs a non-negative integer value`);
    }
    this.byName.set(name, value);
    this.byValue.set(value, name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Resolve an operator-supplied level name to its value.
   *
   * @throws UnknownLevelError if the name is not upper case or not known.
   */
  parse(name: string): number {
    if (!isUpperCaseName(name)) {
      throw new UnknownLevelError(name, `<LEVEL>="${name}" needs to be an upper case string!`);
    }
    const value = this.byName.get(name);
    if (value === undefined) {
      throw new UnknownLevelError(
        name,
        `Unknown logging level "${name}". Choose from ${this.names().join(", ")}`,
      );
    }
    return value;
  }

  /** Display name of a level value, `Level <n>` for unnamed values. */
  nameOf(value: number): string {
    return this.byValue.get(value) ?? `Level ${value}`;
  }

  /** Display names, most severe first. */
  names(): string[] {
    return [...this.byValue.entries()].sort((a, b) => b[0] - a[0]).map(([, name]) => name);
  }
}
