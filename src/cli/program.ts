/**
 * CLI program definition for logtune.
 *
 * Uses Commander. The logging flags are registered through
 * registerLoggingOptions() so a host program can put the same flags on its
 * own command and apply them with applyLoggingOptions().
 */
import path from "node:path";
import { Command } from "commander";
import { loadConfig, validateRootNamespace } from "../config/index.js";
import { ModuleRegistry } from "../introspection/registry.js";
import { scanModuleTree } from "../introspection/scanner.js";
import type { ProgramIntrospector } from "../introspection/types.js";
import { applyLevelOverrides, findFunctionFilter } from "../levels/apply.js";
import type { ApplyContext } from "../levels/apply.js";
import { isFormatName } from "../logging/handlers.js";
import { isUpperCaseName, STANDARD_LEVELS } from "../logging/levels.js";
import type { LevelTable } from "../logging/levels.js";
import type { LoggerRegistry } from "../logging/logger.js";
import { createRegistry } from "../logging/setup.js";
import type { ApplyResult, LevelOverrideRequest } from "../shared/types.js";
import { VERSION } from "../version.js";

/** Values Commander produces for the logging flags. */
export interface LoggingFlags {
  /** `true` when the flag is given without namespaces. */
  verbose?: string[] | true;
  debug?: string[] | true;
  set_logging_level?: string[];
}

export interface CliOptions extends LoggingFlags {
  modules?: string;
  root?: string;
  format?: string;
  show?: boolean;
}

export function registerLoggingOptions(command: Command): Command {
  return command
    .option(
      "--verbose [namespace...]",
      'sets the logging level to INFO; shortcut for "--set_logging_level INFO"',
    )
    .option(
      "--debug [namespace...]",
      'sets the logging level to DEBUG; shortcut for "--set_logging_level DEBUG"',
    )
    .option(
      "--set_logging_level <LEVEL...>",
      "sets the logging level to <LEVEL> (CRITICAL, ERROR, WARNING, INFO, DEBUG, NOTSET). " +
        "Namespaces after a <LEVEL> limit it to those modules; the last part of " +
        '"<a>.<b>.<c>" may also name a function <c> of module <a>.<b>. ' +
        'Several sets are possible as "<LEVEL> [namespace...] <LEVEL> [namespace...]". ' +
        '"<a>.[<b>,<c>.[<d>,<e>]]" resolves to "<a.b> <a.c.d> <a.c.e>".',
    );
}

/**
 * Split `--set_logging_level` tokens into one request per level.
 *
 * Upper-case tokens switch the current level; other tokens are namespaces
 * for it. Levels keep the order they first appear in, a repeated level adds
 * to its earlier request, and a level with no namespaces targets the root.
 */
export function groupLevelTokens(
  tokens: readonly string[],
  levels: LevelTable,
): LevelOverrideRequest[] {
  const [first, ...rest] = tokens;
  if (first === undefined) return [];

  const groups = new Map<number, string[]>();
  let current: string[] = [];
  const select = (levelName: string): void => {
    const level = levels.parse(levelName);
    current = groups.get(level) ?? [];
    groups.set(level, current);
  };

  select(first);
  for (const token of rest) {
    if (isUpperCaseName(token)) {
      select(token);
    } else {
      current.push(token);
    }
  }

  return [...groups].map(([level, namespaces]) => ({ level, namespaces }));
}

/** Requests in application order: --verbose, --debug, then --set_logging_level. */
export function buildOverrideRequests(
  flags: LoggingFlags,
  levels: LevelTable,
): LevelOverrideRequest[] {
  const requests: LevelOverrideRequest[] = [];
  if (flags.verbose !== undefined) {
    requests.push({
      level: STANDARD_LEVELS.INFO,
      namespaces: flags.verbose === true ? [] : flags.verbose,
    });
  }
  if (flags.debug !== undefined) {
    requests.push({
      level: STANDARD_LEVELS.DEBUG,
      namespaces: flags.debug === true ? [] : flags.debug,
    });
  }
  if (flags.set_logging_level !== undefined) {
    requests.push(...groupLevelTokens(flags.set_logging_level, levels));
  }
  return requests;
}

export function applyLoggingOptions(flags: LoggingFlags, ctx: ApplyContext): ApplyResult {
  return applyLevelOverrides(buildOverrideRequests(flags, ctx.registry.levels), ctx);
}

/** One line per logger with its own level, function filters indented below. */
export function describeLoggers(registry: LoggerRegistry): string[] {
  const lines = [`${registry.root.name} ${registry.levels.nameOf(registry.root.level)}`];
  for (const name of registry.loggerNames()) {
    const logger = registry.getLogger(name);
    if (logger.level === STANDARD_LEVELS.NOTSET) continue;
    lines.push(`${name} ${registry.levels.nameOf(logger.level)}`);
    const filter = findFunctionFilter(logger);
    for (const functionName of filter?.functionNames ?? []) {
      lines.push(`  |- ${functionName}`);
    }
  }
  return lines;
}

export interface HandleCliOverrides {
  /** Override the config dir for testing. */
  stateDir?: string;
  env?: NodeJS.ProcessEnv;
  registry?: LoggerRegistry;
  introspector?: ProgramIntrospector;
  report?: (line: string) => void;
}

export interface CliRunResult extends ApplyResult {
  registry: LoggerRegistry;
}

export async function handleCli(
  opts: CliOptions,
  overrides: HandleCliOverrides = {},
): Promise<CliRunResult> {
  const config = loadConfig({ stateDir: overrides.stateDir, env: overrides.env });
  if (opts.format !== undefined) {
    if (!isFormatName(opts.format)) {
      throw new Error(`Invalid --format "${opts.format}". Must be "default" or "verbose"`);
    }
    config.format = opts.format;
  }
  if (opts.root !== undefined) {
    config.rootNamespace = validateRootNamespace(opts.root, "--root");
  }

  const registry = overrides.registry ?? createRegistry(config);
  const report = overrides.report ?? ((line: string) => console.log(line));

  let introspector = overrides.introspector;
  if (opts.modules !== undefined) {
    const modules = new ModuleRegistry();
    await scanModuleTree(path.resolve(opts.modules), {
      rootNamespace: config.rootNamespace,
      registry: modules,
      logger: registry.getLogger("logtune.scanner"),
    });
    introspector = modules;
  }

  const result = applyLoggingOptions(opts, {
    registry,
    introspector: introspector ?? new ModuleRegistry(),
    rootNamespace: config.rootNamespace,
    report,
  });

  if (opts.show) {
    for (const line of describeLoggers(registry)) {
      report(line);
    }
  }

  return { ...result, registry };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("logtune")
    .description("Adjust logging levels per module or function from the command line")
    .version(VERSION)
    .option(
      "--modules <dir>",
      "scan a directory of modules to resolve namespaces against; it must hold compiled " +
        ".js/.mjs files unless logtune runs under a TypeScript loader",
    )
    .option("--root <namespace>", "root namespace the given namespaces are resolved under")
    .option("--format <format>", "console format: default or verbose")
    .option("--show", "print the resulting logger levels");

  registerLoggingOptions(program);

  program.action(async (opts: CliOptions) => {
    await handleCli(opts);
  });

  return program;
}
