/**
 * Library entry: embed logtune's flags and logger tree in a host program.
 */
export {
  applyLoggingOptions,
  buildOverrideRequests,
  describeLoggers,
  groupLevelTokens,
  registerLoggingOptions,
} from "./cli/program.js";
export type { LoggingFlags } from "./cli/program.js";
export { defaultConfig, loadConfig } from "./config/index.js";
export type { LogtuneConfig } from "./config/index.js";
export * from "./introspection/index.js";
export { applyLevelOverrides, applyLoggingLevel, findFunctionFilter } from "./levels/apply.js";
export type { ApplyContext } from "./levels/apply.js";
export { qualifyNamespace, resolveFunctionName, resolveTarget } from "./levels/resolver.js";
export type { ResolveContext } from "./levels/resolver.js";
export * from "./logging/index.js";
export { expandNamespace, expandNamespaces } from "./namespace/expand.js";
export * from "./shared/errors.js";
export type * from "./shared/types.js";
