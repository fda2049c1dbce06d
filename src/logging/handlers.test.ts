import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConsoleHandler,
  FileHandler,
  defaultFormat,
  isFormatName,
  verboseFormat,
} from "./handlers.js";
import type { LogRecord } from "./types.js";

function record(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    ts: "2026-03-04T12:30:01.250Z",
    name: "app.net.server",
    level: 20,
    levelName: "INFO",
    functionName: "accept",
    msg: "connection accepted",
    ...overrides,
  };
}

describe("formats", () => {
  it("defaultFormat", () => {
    expect(defaultFormat(record())).toBe("[INFO] app.net.server.accept - connection accepted");
  });

  it("verboseFormat", () => {
    expect(verboseFormat(record())).toBe(
      "[INFO    ][12:30:01.250] connection accepted [app.net.server.accept]",
    );
  });

  it("isFormatName", () => {
    expect(isFormatName("default")).toBe(true);
    expect(isFormatName("verbose")).toBe(true);
    expect(isFormatName("json")).toBe(false);
    expect(isFormatName("toString")).toBe(false);
  });
});

describe("ConsoleHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes INFO and DEBUG to console.log", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleHandler().handle(record());
    expect(spy).toHaveBeenCalledWith("[INFO] app.net.server.accept - connection accepted");
  });

  it("writes WARNING to console.warn", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ConsoleHandler().handle(record({ level: 30, levelName: "WARNING", msg: "careful" }));
    expect(spy).toHaveBeenCalledWith("[WARNING] app.net.server.accept - careful");
  });

  it("writes ERROR and CRITICAL to console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const handler = new ConsoleHandler();
    handler.handle(record({ level: 40, levelName: "ERROR", msg: "broken" }));
    handler.handle(record({ level: 50, levelName: "CRITICAL", msg: "down" }));
    expect(spy).toHaveBeenNthCalledWith(1, "[ERROR] app.net.server.accept - broken");
    expect(spy).toHaveBeenNthCalledWith(2, "[CRITICAL] app.net.server.accept - down");
  });

  it("uses the given format", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleHandler({ format: (r) => r.msg.toUpperCase() }).handle(record());
    expect(spy).toHaveBeenCalledWith("CONNECTION ACCEPTED");
  });
});

describe("FileHandler", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "logtune-handler-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("appends JSON lines to a dated file", () => {
    const logDir = path.join(tmpDir, "logs");
    const handler = new FileHandler({ logDir });
    handler.handle(record({ msg: "first" }));
    handler.handle(record({ msg: "second" }));

    const files = fs.readdirSync(logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^logtune-\d{4}-\d{2}-\d{2}\.jsonl$/);

    const lines = fs
      .readFileSync(path.join(logDir, files[0] ?? ""), "utf-8")
      .trim()
      .split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "")).toEqual(record({ msg: "first" }));
  });

  it("reports a write failure once and stops writing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const blocker = path.join(tmpDir, "not-a-dir");
    fs.writeFileSync(blocker, "");
    const handler = new FileHandler({ logDir: path.join(blocker, "logs") });

    handler.handle(record());
    handler.handle(record());

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toContain("[logtune] Cannot write log file in");
  });
});
