/**
 * Apply level overrides to the logger registry.
 *
 * Every outcome is reported to the operator through `report` (console.log
 * by default), independently of the levels being changed.
 */
import { FunctionNameFilter } from "../logging/function-filter.js";
import type { Logger, LoggerRegistry } from "../logging/logger.js";
import { expandNamespaces } from "../namespace/expand.js";
import { UnresolvedModuleError } from "../shared/errors.js";
import type { ApplyResult, LevelOverrideRequest, ResolvedTarget } from "../shared/types.js";
import { resolveTarget } from "./resolver.js";
import type { ResolveContext } from "./resolver.js";

const INDENT = "  ";

export interface ApplyContext extends ResolveContext {
  registry: LoggerRegistry;
  /** Receives operator feedback lines. */
  report?: (line: string) => void;
}

/**
 * Set `level` on the root logger (no namespaces) or on each namespace.
 *
 * Bracketed namespaces are expanded first. A namespace without a matching
 * module is reported and skipped; every other failure is thrown.
 */
export function applyLoggingLevel(
  level: number,
  namespaces: readonly string[],
  ctx: ApplyContext,
): ApplyResult {
  const { registry } = ctx;
  const report = ctx.report ?? ((line: string) => console.log(line));
  const levelName = registry.levels.nameOf(level);
  const result: ApplyResult = { applied: [], notFound: [] };

  if (namespaces.length === 0) {
    report(`${levelName} logging level is set.`);
    const previousLevel = registry.root.getEffectiveLevel();
    registry.root.setLevel(level);
    result.applied.push({ namespace: registry.root.name, previousLevel, level });
    return result;
  }

  report(`${levelName} logging level is set for:`);

  for (const namespace of expandNamespaces(namespaces)) {
    let target: ResolvedTarget;
    try {
      target = resolveTarget(namespace, ctx);
    } catch (error: unknown) {
      if (error instanceof UnresolvedModuleError) {
        report(`${INDENT}! MODULE NOT FOUND "${error.namespace}"`);
        result.notFound.push(error.namespace);
        continue;
      }
      throw error;
    }

    const logger = registry.getLogger(target.namespace);
    const previousLevel = logger.getEffectiveLevel();
    logger.setLevel(level);

    if (previousLevel === registry.defaultLevel) {
      report(`${INDENT}${target.namespace}`);
    } else if (previousLevel !== level) {
      report(
        `${INDENT}${target.namespace} (overrides previous level ${registry.levels.nameOf(previousLevel)})`,
      );
    }

    if (target.kind === "moduleFunction") {
      addFunctionFilter(logger, target.functionName, report);
      result.applied.push({
        namespace: target.namespace,
        functionName: target.functionName,
        previousLevel,
        level,
      });
    } else {
      result.applied.push({ namespace: target.namespace, previousLevel, level });
    }
  }

  return result;
}

/** Apply several requests in order. */
export function applyLevelOverrides(
  requests: readonly LevelOverrideRequest[],
  ctx: ApplyContext,
): ApplyResult {
  const combined: ApplyResult = { applied: [], notFound: [] };
  for (const request of requests) {
    const { applied, notFound } = applyLoggingLevel(request.level, request.namespaces, ctx);
    combined.applied.push(...applied);
    combined.notFound.push(...notFound);
  }
  return combined;
}

/** The function filter on a logger node, if one was attached. */
export function findFunctionFilter(logger: Logger): FunctionNameFilter | undefined {
  for (const filter of logger.filters) {
    if (filter instanceof FunctionNameFilter) return filter;
  }
  return undefined;
}

function addFunctionFilter(
  logger: Logger,
  functionName: string,
  report: (line: string) => void,
): void {
  const existing = findFunctionFilter(logger);
  if (existing) {
    existing.addFunctionName(functionName);
  } else {
    logger.addFilter(new FunctionNameFilter(functionName));
    report(`${INDENT.repeat(2)}|  (filtering following function(s):)`);
  }
  report(`${INDENT.repeat(2)}|- ${functionName}`);
}
