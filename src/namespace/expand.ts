/**
 * Bracketed namespace expansion.
 *
 * Turns the compact notation `a.[b,c.[d,e]]` into the flat list
 * `a.b`, `a.c.d`, `a.c.e`. A bracket group always closes the spec it
 * belongs to, and its items are specs themselves, so groups nest.
 */
import { NamespaceSyntaxError } from "../shared/errors.js";

/**
 * Expand one namespace spec into fully qualified dotted names.
 *
 * A spec without brackets is returned as the only element.
 *
 * @throws NamespaceSyntaxError if the bracket grammar is violated.
 */
export function expandNamespace(spec: string): string[] {
  const open = spec.indexOf("[");
  if (open === -1) {
    return [spec];
  }

  const prefix = spec.slice(0, open);
  if (!prefix.endsWith(".")) {
    throw new NamespaceSyntaxError(
      spec,
      `the package separator "." between "${prefix}" and "${spec.slice(open)}" is missing!`,
    );
  }

  const close = findClosingBracket(spec, open);
  if (close === -1) {
    throw new NamespaceSyntaxError(spec, `the trailing "]" after "${spec}" is missing!`);
  }
  if (close !== spec.length - 1) {
    throw syntaxProblem(spec, close + 1);
  }

  const result: string[] = [];
  for (const item of splitItems(spec, open + 1, close)) {
    for (const expanded of expandNamespace(item)) {
      result.push(prefix + expanded);
    }
  }
  return result;
}

/** Expand every spec in order and concatenate the results. */
export function expandNamespaces(specs: readonly string[]): string[] {
  return specs.flatMap((spec) => expandNamespace(spec));
}

/** Index of the `]` matching the `[` at `open`, or -1. */
function findClosingBracket(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "[") {
      depth++;
    } else if (ch === "]") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split the group body `spec[start, end)` on commas that are not inside a
 * nested group.
 */
function splitItems(spec: string, start: number, end: number): string[] {
  const items: string[] = [];
  let depth = 0;
  let itemStart = start;

  const push = (item: string): void => {
    if (item === "") {
      throw new NamespaceSyntaxError(
        spec,
        `there is an empty namespace within "${spec.slice(start - 1, end + 1)}"!`,
      );
    }
    items.push(item);
  };

  for (let i = start; i < end; i++) {
    const ch = spec[i];
    if (ch === "[") {
      depth++;
    } else if (ch === "]") {
      depth--;
      // A nested group must be followed by "," or the enclosing "]".
      if (depth === 0 && i + 1 < end && spec[i + 1] !== ",") {
        throw syntaxProblem(spec, i + 1);
      }
    } else if (ch === "," && depth === 0) {
      push(spec.slice(itemStart, i));
      itemStart = i + 1;
    }
  }
  push(spec.slice(itemStart, end));

  return items;
}

function syntaxProblem(spec: string, position: number): NamespaceSyntaxError {
  return new NamespaceSyntaxError(
    spec,
    `there is a syntax problem between "${spec.slice(0, position)}" and "${spec.slice(position)}"!`,
  );
}
