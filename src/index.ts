#!/usr/bin/env node
/**
 * logtune: per-namespace logging levels from the command line.
 *
 * Main entry point. Installs signal and error handlers, then delegates to
 * Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";
import { installSignalHandlers } from "./cli/signals.js";
import { LogtuneError } from "./shared/errors.js";

function describeError(error: unknown): string {
  if (error instanceof LogtuneError) return error.message;
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}

installSignalHandlers();

process.on("uncaughtException", (error) => {
  console.error("[logtune] Uncaught exception:", describeError(error));
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("[logtune] Unhandled rejection:", describeError(reason));
  process.exit(1);
});

const program = buildProgram();

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[logtune] ${describeError(err)}`);
  process.exit(1);
});
