/**
 * Configuration for logtune.
 *
 * Loaded from ~/.logtune/config.yaml when present; every field has a
 * default. Environment variables override the file, CLI flags override both.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { isFormatName } from "../logging/handlers.js";
import type { FormatName } from "../logging/handlers.js";

const STATE_DIRNAME = ".logtune";
const CONFIG_FILENAME = "config.yaml";

export const DEFAULT_ROOT_NAMESPACE = "app";
export const DEFAULT_LEVEL_NAME = "WARNING";

export interface LogtuneConfig {
  /** Namespace every operator-supplied namespace is resolved under. */
  rootNamespace: string;
  /** Level of the root logger before any override. */
  defaultLevel: string;
  /** Console format. */
  format: FormatName;
  /** Whether records are also written as JSON lines to `logDir`. */
  fileOutput: boolean;
  logDir: string;
  /** Custom level names and their values, e.g. `{ TRACE: 5 }`. */
  levels: Record<string, number>;
}

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LOGTUNE_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new Error(
        `Invalid LOGTUNE_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new Error(`Invalid LOGTUNE_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LOGTUNE_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export function defaultConfig(stateDir: string = resolveStateDir()): LogtuneConfig {
  return {
    rootNamespace: DEFAULT_ROOT_NAMESPACE,
    defaultLevel: DEFAULT_LEVEL_NAME,
    format: "default",
    fileOutput: false,
    logDir: path.join(stateDir, "logs"),
    levels: {},
  };
}

export interface LoadConfigOptions {
  /** Defaults to the resolved state dir (~/.logtune). */
  stateDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the effective configuration: defaults, then config.yaml, then
 * environment overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): LogtuneConfig {
  const env = options.env ?? process.env;
  const stateDir = options.stateDir ?? resolveStateDir(env);
  const configPath = resolveConfigPath(stateDir);

  let config = defaultConfig(stateDir);

  if (fs.existsSync(configPath)) {
    const raw: unknown = parseYaml(fs.readFileSync(configPath, "utf-8"));
    config = { ...config, ...validateConfig(raw, configPath) };
  }

  const rootOverride = env.LOGTUNE_ROOT_NAMESPACE?.trim();
  if (rootOverride) {
    config.rootNamespace = validateRootNamespace(rootOverride, "LOGTUNE_ROOT_NAMESPACE");
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validate a parsed config.yaml; only fields that are present are returned. */
function validateConfig(raw: unknown, source: string): Partial<LogtuneConfig> {
  // An empty file parses to null.
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new Error(`Config in ${source} must be a mapping`);
  }

  const result: Partial<LogtuneConfig> = {};

  if (raw.rootNamespace !== undefined) {
    if (typeof raw.rootNamespace !== "string") {
      throw new Error(`Config in ${source} has invalid "rootNamespace" (string)`);
    }
    result.rootNamespace = validateRootNamespace(raw.rootNamespace, source);
  }

  if (raw.defaultLevel !== undefined) {
    if (typeof raw.defaultLevel !== "string" || raw.defaultLevel === "") {
      throw new Error(`Config in ${source} has invalid "defaultLevel" (level name)`);
    }
    result.defaultLevel = raw.defaultLevel;
  }

  if (raw.format !== undefined) {
    if (typeof raw.format !== "string" || !isFormatName(raw.format)) {
      throw new Error(`Config in ${source} has invalid "format". Must be "default" or "verbose"`);
    }
    result.format = raw.format;
  }

  if (raw.fileOutput !== undefined) {
    if (typeof raw.fileOutput !== "boolean") {
      throw new Error(`Config in ${source} has invalid "fileOutput" (boolean)`);
    }
    result.fileOutput = raw.fileOutput;
  }

  if (raw.logDir !== undefined) {
    if (typeof raw.logDir !== "string" || raw.logDir === "") {
      throw new Error(`Config in ${source} has invalid "logDir" (path)`);
    }
    result.logDir = path.resolve(path.dirname(source), raw.logDir);
  }

  if (raw.levels !== undefined) {
    if (!isRecord(raw.levels)) {
      throw new Error(`Config in ${source} has invalid "levels" (mapping of name to number)`);
    }
    const levels: Record<string, number> = {};
    for (const [name, value] of Object.entries(raw.levels)) {
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new Error(`Config in ${source} has invalid value for level "${name}"`);
      }
      levels[name] = value;
    }
    result.levels = levels;
  }

  return result;
}

export function validateRootNamespace(value: string, source: string): string {
  if (!/^[A-Za-z_$][\w$-]*(?:\.[A-Za-z_$][\w$-]*)*$/.test(value)) {
    throw new Error(`Invalid root namespace "${value}" in ${source}: expected a dotted name`);
  }
  return value;
}
