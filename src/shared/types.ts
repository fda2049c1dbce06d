/**
 * Shared types for logtune.
 */

/** What a flat namespace resolved to in the program's module tree. */
export type ResolvedTarget =
  | {
      kind: "module";
      /** Fully qualified module namespace. */
      namespace: string;
    }
  | {
      kind: "moduleFunction";
      /** Fully qualified namespace of the module defining the function. */
      namespace: string;
      functionName: string;
    };

/** One level with the namespaces it applies to; none means the root logger. */
export interface LevelOverrideRequest {
  level: number;
  namespaces: string[];
}

export interface AppliedOverride {
  /** Logger the level was set on. */
  namespace: string;
  /** Set when the override is scoped to a function. */
  functionName?: string;
  /** Effective level of the logger before the override. */
  previousLevel: number;
  level: number;
}

export interface ApplyResult {
  applied: AppliedOverride[];
  /** Fully qualified namespaces that matched no module. */
  notFound: string[];
}
