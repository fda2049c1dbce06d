/**
 * Scoped redirection of console output into a logger.
 *
 * While the callback runs, console.log/console.info become INFO records and
 * console.warn/console.error become WARNING/ERROR records on the given
 * logger. The original console functions are put back when the callback
 * returns, throws or its promise settles.
 */
import { format } from "node:util";
import { callerFunctionName } from "./caller.js";
import { STANDARD_LEVELS } from "./levels.js";
import type { Logger } from "./logger.js";

const CONSOLE_METHODS = ["log", "info", "warn", "error"] as const;

type ConsoleMethod = (typeof CONSOLE_METHODS)[number];

const REDIRECTED_LEVELS: Record<ConsoleMethod, number> = {
  log: STANDARD_LEVELS.INFO,
  info: STANDARD_LEVELS.INFO,
  warn: STANDARD_LEVELS.WARNING,
  error: STANDARD_LEVELS.ERROR,
};

export async function withConsoleRedirect<T>(
  logger: Logger,
  fn: () => T | Promise<T>,
): Promise<T> {
  const originals = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  // Handlers writing to the console must not feed back into the logger.
  const restoreForHandlers = <R>(write: () => R): R => {
    const redirected = {
      log: console.log,
      info: console.info,
      warn: console.warn,
      error: console.error,
    };
    Object.assign(console, originals);
    try {
      return write();
    } finally {
      Object.assign(console, redirected);
    }
  };

  for (const method of CONSOLE_METHODS) {
    const level = REDIRECTED_LEVELS[method];
    const redirect = (...args: unknown[]): void => {
      const functionName = callerFunctionName(redirect);
      restoreForHandlers(() => logger.log(level, format(...args), functionName));
    };
    console[method] = redirect;
  }

  try {
    return await fn();
  } finally {
    Object.assign(console, originals);
  }
}
