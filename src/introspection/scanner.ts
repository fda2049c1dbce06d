/**
 * Populate a ModuleRegistry from a directory of modules.
 *
 * Each module file becomes `<rootNamespace>.<dir>.<file>`; an `index` file
 * stands for its directory. Modules are loaded with dynamic import(), and
 * the classes a module defines are the ones its source declares.
 *
 * `.ts` and `.mts` files only load when the process runs under a TypeScript
 * loader. A module that fails to import is logged and left unregistered, so
 * namespaces inside it resolve as not found.
 */
import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { Logger } from "../logging/logger.js";
import type { ModuleRegistry } from "./registry.js";

const MODULE_EXTENSIONS = new Set([".js", ".mjs", ".ts", ".mts"]);
const EXCLUDED_FILES = /\.(?:d|test|spec)\.[cm]?[jt]s$/;

export interface ScanOptions {
  rootNamespace: string;
  registry: ModuleRegistry;
  logger?: Logger;
}

export interface ScanFailure {
  namespace: string;
  file: string;
  reason: string;
}

export interface ScanResult {
  /** Namespaces registered, in file order. */
  registered: string[];
  /** Modules whose import threw. */
  failed: ScanFailure[];
}

/** Recursively collect module files under a directory, sorted by path. */
export function collectModuleFiles(dir: string): string[] {
  const results: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== "node_modules" && !entry.name.startsWith(".")) {
        results.push(...collectModuleFiles(full));
      }
    } else if (
      entry.isFile() &&
      MODULE_EXTENSIONS.has(path.extname(entry.name)) &&
      !EXCLUDED_FILES.test(entry.name)
    ) {
      results.push(full);
    }
  }
  return results.sort();
}

export function namespaceForFile(rootDir: string, file: string, rootNamespace: string): string {
  const parts = path.relative(rootDir, file).split(path.sep);
  const fileName = parts.pop() ?? "";
  const moduleName = fileName.slice(0, fileName.length - path.extname(fileName).length);
  if (moduleName !== "index") {
    parts.push(moduleName);
  }
  return [rootNamespace, ...parts].join(".");
}

/** Names of the classes declared in a module's source text. */
export function declaredClassNames(source: string): string[] {
  const names: string[] = [];
  const code = stripCommentsAndStrings(source);
  for (const match of code.matchAll(/\bclass\s+([A-Za-z_$][\w$]*)/g)) {
    const name = match[1];
    if (name && name !== "extends" && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Blank out comments and string or template literals, keeping everything
 * else. Template substitutions are blanked along with the template.
 */
export function stripCommentsAndStrings(source: string): string {
  let out = "";
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    const next = source.charAt(i + 1);
    let end: number;
    if (ch === "/" && next === "/") {
      end = source.indexOf("\n", i);
      if (end === -1) end = source.length;
    } else if (ch === "/" && next === "*") {
      const close = source.indexOf("*/", i + 2);
      end = close === -1 ? source.length : close + 2;
    } else if (ch === '"' || ch === "'" || ch === "`") {
      end = i + 1;
      while (end < source.length && source.charAt(end) !== ch) {
        end += source.charAt(end) === "\\" ? 2 : 1;
      }
      end = Math.min(end + 1, source.length);
    } else {
      out += ch;
      i++;
      continue;
    }
    out += " ";
    i = end;
  }
  return out;
}

/**
 * Import every module under `rootDir` and register it.
 */
export async function scanModuleTree(rootDir: string, options: ScanOptions): Promise<ScanResult> {
  const { rootNamespace, registry, logger } = options;
  if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
    throw new Error(`Module directory not found: ${rootDir}`);
  }

  const result: ScanResult = { registered: [], failed: [] };
  for (const file of collectModuleFiles(rootDir)) {
    const namespace = namespaceForFile(rootDir, file, rootNamespace);
    if (result.registered.includes(namespace)) {
      logger?.debug(`skipping ${file}: ${namespace} is already registered`);
      continue;
    }

    let exports: unknown;
    try {
      exports = await import(pathToFileURL(file).href);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      logger?.warning(`cannot import ${file} as ${namespace}: ${reason}`);
      result.failed.push({ namespace, file, reason });
      continue;
    }
    if (typeof exports !== "object" || exports === null) {
      continue;
    }

    const definedClasses = declaredClassNames(fs.readFileSync(file, "utf-8"));
    registry.register(namespace, exports, { definedClasses });
    result.registered.push(namespace);
    logger?.debug(`registered ${namespace} (${definedClasses.length} classes)`);
  }

  return result;
}
