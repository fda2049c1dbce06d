/**
 * Namespace resolution.
 *
 * A namespace is qualified with the program's root namespace and then read
 * either as a module, or as a module followed by the name of a function
 * defined on one of the module's classes.
 */
import type { ProgramIntrospector } from "../introspection/types.js";
import {
  FunctionNotFoundError,
  NoClassesInModuleError,
  NotAFunctionError,
  UnresolvedModuleError,
} from "../shared/errors.js";
import type { ResolvedTarget } from "../shared/types.js";

export interface ResolveContext {
  introspector: ProgramIntrospector;
  rootNamespace: string;
}

export function qualifyNamespace(namespace: string, rootNamespace: string): string {
  return `${rootNamespace}.${namespace}`;
}

/**
 * Resolve a bracket-free namespace.
 *
 * @throws UnresolvedModuleError if neither the namespace nor its parent is a module.
 * @throws NoClassesInModuleError, NotAFunctionError, FunctionNotFoundError
 *   if the trailing segment cannot be matched to a class member.
 */
export function resolveTarget(namespace: string, ctx: ResolveContext): ResolvedTarget {
  const { introspector, rootNamespace } = ctx;
  const qualified = qualifyNamespace(namespace, rootNamespace);

  if (namespace === "" || namespace.split(".").includes("")) {
    throw new UnresolvedModuleError(qualified);
  }

  if (introspector.hasModule(qualified)) {
    return { kind: "module", namespace: qualified };
  }

  const lastDot = qualified.lastIndexOf(".");
  const moduleName = qualified.slice(0, lastDot);
  const candidate = qualified.slice(lastDot + 1);
  if (!introspector.hasModule(moduleName)) {
    throw new UnresolvedModuleError(qualified);
  }

  return {
    kind: "moduleFunction",
    namespace: moduleName,
    functionName: resolveFunctionName(moduleName, candidate, introspector),
  };
}

/**
 * Find `name` on the classes a module defines. The first class that has it
 * wins; accessors resolve to the getter's name, or the setter's.
 */
export function resolveFunctionName(
  moduleName: string,
  name: string,
  introspector: ProgramIntrospector,
): string {
  const classes = introspector.classesDefinedIn(moduleName);
  if (classes.length === 0) {
    throw new NoClassesInModuleError(moduleName);
  }

  for (const cls of classes) {
    const member = introspector.lookupMember(cls, name);
    switch (member.kind) {
      case "function":
        return member.name;
      case "accessor": {
        const accessorName = member.getterName ?? member.setterName;
        if (accessorName) return accessorName;
        break;
      }
      case "value":
        throw new NotAFunctionError(name, moduleName);
      case "missing":
        break;
    }
  }

  throw new FunctionNotFoundError(name, moduleName);
}
