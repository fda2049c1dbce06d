/**
 * Capability interface over the program's module structure.
 */

/** Any class constructor, abstract ones included. */
export type ClassRef = abstract new (...args: never[]) => unknown;

export type MemberLookup =
  | { kind: "function"; name: string }
  | { kind: "accessor"; getterName?: string; setterName?: string }
  | { kind: "value" }
  | { kind: "missing" };

export interface ProgramIntrospector {
  /** Whether a dotted namespace names an importable module or package. */
  hasModule(namespace: string): boolean;
  /** Classes defined by the module itself, re-exports excluded. */
  classesDefinedIn(namespace: string): ClassRef[];
  /** Look a member up on a class, inherited and static members included. */
  lookupMember(cls: ClassRef, name: string): MemberLookup;
}
