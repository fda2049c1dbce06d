import { afterEach, describe, expect, it, vi } from "vitest";
import { withConsoleRedirect } from "./console-redirect.js";
import { STANDARD_LEVELS } from "./levels.js";
import { LoggerRegistry } from "./logger.js";
import type { Handler, LogRecord } from "./types.js";

function setup(): { registry: LoggerRegistry; records: LogRecord[] } {
  const registry = new LoggerRegistry({ defaultLevel: STANDARD_LEVELS.DEBUG });
  const records: LogRecord[] = [];
  const handler: Handler = { level: STANDARD_LEVELS.NOTSET, handle: (r) => void records.push(r) };
  registry.root.addHandler(handler);
  return { registry, records };
}

describe("withConsoleRedirect", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("turns console output into records", async () => {
    const { registry, records } = setup();

    await withConsoleRedirect(registry.getLogger("app"), () => {
      console.log("count: %d", 3);
      console.error("failed");
      console.warn("careful");
    });

    expect(records.map((r) => [r.levelName, r.msg])).toEqual([
      ["INFO", "count: 3"],
      ["ERROR", "failed"],
      ["WARNING", "careful"],
    ]);
  });

  it("names the function that printed", async () => {
    const { registry, records } = setup();

    class Job {
      run(): void {
        console.log("running");
      }
    }

    await withConsoleRedirect(registry.getLogger("app"), () => new Job().run());
    expect(records[0]?.functionName).toBe("run");
  });

  it("returns the callback's value", async () => {
    const { registry } = setup();
    await expect(withConsoleRedirect(registry.root, () => 42)).resolves.toBe(42);
    await expect(withConsoleRedirect(registry.root, async () => "done")).resolves.toBe("done");
  });

  it("restores the console after a throw", async () => {
    const { registry } = setup();
    const original = console.log;

    await expect(
      withConsoleRedirect(registry.root, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(console.log).toBe(original);
  });

  it("restores the console after a rejected promise", async () => {
    const { registry } = setup();
    const original = console.error;

    await expect(
      withConsoleRedirect(registry.root, async () => {
        throw new Error("later");
      }),
    ).rejects.toThrow("later");

    expect(console.error).toBe(original);
  });

  it("lets console handlers write to the real console", async () => {
    const registry = new LoggerRegistry({ defaultLevel: STANDARD_LEVELS.DEBUG });
    const lines: string[] = [];
    const spy = vi.spyOn(console, "log").mockImplementation((line: string) => {
      lines.push(line);
    });
    registry.root.addHandler({
      level: STANDARD_LEVELS.NOTSET,
      handle: (r) => console.log(`handled ${r.msg}`),
    });

    await withConsoleRedirect(registry.root, () => {
      console.log("hello");
    });

    expect(lines).toEqual(["handled hello"]);
    expect(console.log).toBe(spy);
  });
});
