import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LoggerRegistry } from "../logging/logger.js";
import type { LogRecord } from "../logging/types.js";
import { ModuleRegistry } from "./registry.js";
import {
  collectModuleFiles,
  declaredClassNames,
  namespaceForFile,
  scanModuleTree,
  stripCommentsAndStrings,
} from "./scanner.js";

const SAMPLE_APP = fileURLToPath(new URL("../../test/fixtures/sample-app", import.meta.url));
const EDGE_APP = fileURLToPath(new URL("../../test/fixtures/edge-app", import.meta.url));

describe("collectModuleFiles", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "logtune-scan-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("keeps module files and skips declarations, tests and dependencies", () => {
    const files = [
      "a.ts",
      "b.d.ts",
      "c.test.ts",
      "c.spec.js",
      "d.js",
      "notes.md",
      "node_modules/x.js",
      ".cache/y.js",
      "sub/e.mts",
    ];
    for (const file of files) {
      const full = path.join(tmpDir, file);
      fs.mkdirSync(path.dirname(full), { recursive: true });
      fs.writeFileSync(full, "");
    }

    expect(collectModuleFiles(tmpDir)).toEqual([
      path.join(tmpDir, "a.ts"),
      path.join(tmpDir, "d.js"),
      path.join(tmpDir, "sub", "e.mts"),
    ]);
  });
});

describe("namespaceForFile", () => {
  it("maps paths to dotted namespaces", () => {
    const root = path.join(os.tmpdir(), "proj");
    expect(namespaceForFile(root, path.join(root, "net", "server.ts"), "app")).toBe(
      "app.net.server",
    );
    expect(namespaceForFile(root, path.join(root, "net", "index.js"), "app")).toBe("app.net");
    expect(namespaceForFile(root, path.join(root, "index.mjs"), "app")).toBe("app");
  });
});

describe("declaredClassNames", () => {
  it("finds named class declarations", () => {
    const source = [
      "export class Server extends Base {}",
      "class Connection {}",
      "const Anonymous = class extends Base {};",
      "export default class Server {}",
    ].join("\n");
    expect(declaredClassNames(source)).toEqual(["Server", "Connection"]);
  });

  it("ignores classes named in comments and strings", () => {
    const source = [
      "// re-exports the class Server",
      "/* class Hidden {} */",
      'const a = "class Quoted";',
      "const b = 'class Single';",
      "const c = `class ${name} Template`;",
      'export { Server } from "./server.js";',
      "class Real {}",
    ].join("\n");
    expect(declaredClassNames(source)).toEqual(["Real"]);
  });
});

describe("stripCommentsAndStrings", () => {
  it("blanks comments and literals and keeps code", () => {
    expect(stripCommentsAndStrings('a = "x\\"y"; // note\nb /* c */ = `t`;')).toBe(
      "a =  ;  \nb   =  ;",
    );
  });
});

describe("scanModuleTree", () => {
  it("registers every module under the root namespace", async () => {
    const registry = new ModuleRegistry();
    const result = await scanModuleTree(SAMPLE_APP, { rootNamespace: "app", registry });

    expect(result).toEqual({ registered: ["app.net", "app.net.server", "app.util"], failed: [] });
    expect(registry.hasModule("app.net.server")).toBe(true);
  });

  it("assigns classes to the module that declares them", async () => {
    const registry = new ModuleRegistry();
    await scanModuleTree(SAMPLE_APP, { rootNamespace: "app", registry });

    expect(registry.classesDefinedIn("app.net.server").map((c) => c.name)).toEqual([
      "Server",
      "Connection",
    ]);
    expect(registry.classesDefinedIn("app.net")).toEqual([]);
    expect(registry.classesDefinedIn("app.util")).toEqual([]);
  });

  it("logs a module that fails to import and registers the rest", async () => {
    const registry = new ModuleRegistry();
    const loggers = new LoggerRegistry();
    const records: LogRecord[] = [];
    loggers.root.addHandler({ level: 0, handle: (record) => records.push(record) });

    const result = await scanModuleTree(EDGE_APP, {
      rootNamespace: "app",
      registry,
      logger: loggers.getLogger("scanner"),
    });

    expect(result.registered).toEqual(["app.defs", "app.net.server", "app.zz"]);
    expect(result.failed.map((f) => [f.namespace, f.file])).toEqual([
      ["app.broken", path.join(EDGE_APP, "broken.ts")],
    ]);
    expect(result.failed[0]?.reason).toContain("database URL is not set");
    expect(registry.hasModule("app.broken")).toBe(false);
    expect(records.map((r) => r.levelName)).toEqual(["WARNING"]);
    expect(records[0]?.msg).toContain(
      `cannot import ${path.join(EDGE_APP, "broken.ts")} as app.broken`,
    );
  });

  it("keeps a class with the module that declares it, not the one re-exporting it", async () => {
    const registry = new ModuleRegistry();
    await scanModuleTree(EDGE_APP, { rootNamespace: "app", registry });

    expect(registry.classesDefinedIn("app.defs").map((c) => c.name)).toEqual(["Worker"]);
    expect(registry.classesDefinedIn("app.zz")).toEqual([]);
  });

  it("rejects a missing directory", async () => {
    await expect(
      scanModuleTree(path.join(SAMPLE_APP, "missing"), {
        rootNamespace: "app",
        registry: new ModuleRegistry(),
      }),
    ).rejects.toThrow("Module directory not found");
  });
});
