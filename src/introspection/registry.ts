/**
 * Explicit module registry.
 *
 * The program registers its modules (dotted namespace → exports object) at
 * startup, by hand or through scanModuleTree(). Packages need no entry of
 * their own: any proper prefix of a registered namespace counts as one.
 */
import { stripAccessorPrefix } from "../logging/caller.js";
import type { ClassRef, MemberLookup, ProgramIntrospector } from "./types.js";

/** Own properties every function has; not members a caller can ask for. */
const FUNCTION_INTRINSICS = new Set(["length", "name", "prototype", "caller", "arguments"]);

export function isClass(value: unknown): value is ClassRef {
  return typeof value === "function" && /^class[\s{]/.test(Function.prototype.toString.call(value));
}

export interface RegisterOptions {
  /**
   * Names of the classes the module declares itself. Without it, every class
   * in the exports counts. Either way a class keeps the first module that
   * claimed it.
   */
  definedClasses?: readonly string[];
}

interface ModuleEntry {
  members: Map<string, unknown>;
}

export class ModuleRegistry implements ProgramIntrospector {
  private readonly modules = new Map<string, ModuleEntry>();
  private readonly owners = new Map<ClassRef, string>();

  register(namespace: string, exports: object, options: RegisterOptions = {}): void {
    if (this.modules.has(namespace)) {
      throw new Error(`Module "${namespace}" is already registered`);
    }

    const members = new Map<string, unknown>(Object.entries(exports));
    const defined = options.definedClasses ? new Set(options.definedClasses) : null;

    for (const value of members.values()) {
      if (!isClass(value)) continue;
      if (this.owners.has(value)) continue;
      if (!defined || defined.has(value.name)) {
        this.owners.set(value, namespace);
      }
    }

    this.modules.set(namespace, { members });
  }

  /** Registered namespaces, in registration order. */
  moduleNames(): string[] {
    return [...this.modules.keys()];
  }

  hasModule(namespace: string): boolean {
    if (this.modules.has(namespace)) return true;
    const packagePrefix = `${namespace}.`;
    for (const name of this.modules.keys()) {
      if (name.startsWith(packagePrefix)) return true;
    }
    return false;
  }

  classesDefinedIn(namespace: string): ClassRef[] {
    const entry = this.modules.get(namespace);
    if (!entry) return [];

    const classes: ClassRef[] = [];
    for (const value of entry.members.values()) {
      if (isClass(value) && this.owners.get(value) === namespace && !classes.includes(value)) {
        classes.push(value);
      }
    }
    return classes;
  }

  lookupMember(cls: ClassRef, name: string): MemberLookup {
    return lookupClassMember(cls, name);
  }
}

/**
 * Find `name` on a class: instance members along the prototype chain first,
 * then static members along the constructor chain.
 */
export function lookupClassMember(cls: ClassRef, name: string): MemberLookup {
  const prototype: unknown = cls.prototype;
  const descriptor =
    findDescriptor(prototype, name, Object.prototype) ??
    findDescriptor(cls, name, Function.prototype, FUNCTION_INTRINSICS);

  if (!descriptor) {
    return { kind: "missing" };
  }

  if (descriptor.get || descriptor.set) {
    const getterName = descriptor.get ? stripAccessorPrefix(descriptor.get.name) : "";
    const setterName = descriptor.set ? stripAccessorPrefix(descriptor.set.name) : "";
    return {
      kind: "accessor",
      ...(getterName ? { getterName } : {}),
      ...(setterName ? { setterName } : {}),
    };
  }

  if (typeof descriptor.value === "function") {
    return { kind: "function", name };
  }
  return { kind: "value" };
}

function findDescriptor(
  start: unknown,
  name: string,
  stop: object,
  ignoredDataMembers?: ReadonlySet<string>,
): PropertyDescriptor | undefined {
  let current: unknown = start;
  while ((typeof current === "object" || typeof current === "function") && current !== null) {
    if (current === stop) break;
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor && !(ignoredDataMembers?.has(name) && isPlainData(descriptor))) {
      return descriptor;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function isPlainData(descriptor: PropertyDescriptor): boolean {
  return !descriptor.get && !descriptor.set && typeof descriptor.value !== "function";
}
