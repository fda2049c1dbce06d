import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleHandler, FileHandler } from "./handlers.js";
import { STANDARD_LEVELS } from "./levels.js";
import { createRegistry } from "./setup.js";
import type { RegistrySettings } from "./setup.js";

function settings(overrides: Partial<RegistrySettings> = {}): RegistrySettings {
  return {
    defaultLevel: "WARNING",
    format: "default",
    fileOutput: false,
    logDir: path.join(os.tmpdir(), "logtune-unused"),
    levels: {},
    ...overrides,
  };
}

describe("createRegistry", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it("sets the root to the default level with a console handler", () => {
    const registry = createRegistry(settings({ defaultLevel: "ERROR" }));

    expect(registry.root.level).toBe(STANDARD_LEVELS.ERROR);
    expect(registry.defaultLevel).toBe(STANDARD_LEVELS.ERROR);
    expect(registry.root.handlers).toHaveLength(1);
    expect(registry.root.handlers[0]).toBeInstanceOf(ConsoleHandler);
  });

  it("registers custom levels before parsing the default level", () => {
    const registry = createRegistry(settings({ defaultLevel: "TRACE", levels: { TRACE: 5 } }));

    expect(registry.root.level).toBe(5);
    expect(registry.levels.nameOf(5)).toBe("TRACE");
  });

  it("writes console output in the configured format", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = createRegistry(settings({ format: "verbose" }));

    registry.getLogger("app.net").log(STANDARD_LEVELS.WARNING, "slow", "accept");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/^\[WARNING \]\[\d\d:\d\d:\d\d\.\d{3}\] slow \[app\.net\.accept\]$/);
  });

  it("adds a file handler when file output is on", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "logtune-setup-test-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = createRegistry(settings({ fileOutput: true, logDir: tmpDir }));

    expect(registry.root.handlers[1]).toBeInstanceOf(FileHandler);

    registry.getLogger("app").log(STANDARD_LEVELS.WARNING, "to file", "main");
    const files = fs.readdirSync(tmpDir);
    expect(files).toHaveLength(1);
    const line: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, files[0] ?? ""), "utf-8"));
    expect(line).toMatchObject({ name: "app", functionName: "main", msg: "to file" });
  });

  it("rejects an unknown default level", () => {
    expect(() => createRegistry(settings({ defaultLevel: "LOUD" }))).toThrow(
      'Unknown logging level "LOUD"',
    );
  });
});
