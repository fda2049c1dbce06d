import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "logtune";

const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json", "./package.json"] as const;

function isPackageJson(value: unknown): value is { name?: unknown; version?: unknown } {
  return typeof value === "object" && value !== null;
}

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      // not present at this depth (src/ vs dist/)
      continue;
    }
    if (!isPackageJson(parsed) || parsed.name !== CORE_PACKAGE_NAME) {
      continue;
    }
    if (typeof parsed.version === "string" && parsed.version.trim()) {
      return parsed.version.trim();
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
