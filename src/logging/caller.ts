/**
 * Originating function name of a log call, read from a V8 stack trace.
 */

/** Function name reported for calls made at module top level. */
export const TOP_LEVEL_FUNCTION = "<module>";

// "    at async Server.handle [as onRequest] (file:///srv/app.js:10:5)"
const FRAME_WITH_LOCATION = /^\s*at (?:async )?(.+?) \(/;

/**
 * Reduce a single stack frame line to the bare function name.
 *
 * `Server.handle` gives `handle`, `Server.get port` gives `port`,
 * `new Server` gives `constructor`. Frames without a function name give
 * {@link TOP_LEVEL_FUNCTION}.
 */
export function functionNameFromFrame(frame: string): string {
  const match = FRAME_WITH_LOCATION.exec(frame);
  if (!match?.[1]) {
    return TOP_LEVEL_FUNCTION;
  }

  let name = match[1].replace(/ \[as [^\]]+\]$/, "");
  if (name.startsWith("new ")) {
    return "constructor";
  }
  const lastDot = name.lastIndexOf(".");
  if (lastDot !== -1) {
    name = name.slice(lastDot + 1);
  }
  name = stripAccessorPrefix(name);

  return name === "" || name === "<anonymous>" ? TOP_LEVEL_FUNCTION : name;
}

/** `get port` → `port`, `set port` → `port`. */
export function stripAccessorPrefix(name: string): string {
  return name.replace(/^(?:get|set) /, "");
}

/**
 * Name of the function that called `callee`.
 *
 * Frames from `callee` upwards are cut off by `Error.captureStackTrace`,
 * so the first remaining frame is the caller.
 */
export function callerFunctionName(callee: Function): string {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, callee);
  const frame = holder.stack?.split("\n").find((line) => /^\s*at /.test(line));
  return frame ? functionNameFromFrame(frame) : TOP_LEVEL_FUNCTION;
}
