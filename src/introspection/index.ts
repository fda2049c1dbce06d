export { ModuleRegistry, isClass, lookupClassMember } from "./registry.js";
export type { RegisterOptions } from "./registry.js";
export {
  scanModuleTree,
  collectModuleFiles,
  namespaceForFile,
  declaredClassNames,
  stripCommentsAndStrings,
} from "./scanner.js";
export type { ScanFailure, ScanOptions, ScanResult } from "./scanner.js";
export type { ClassRef, MemberLookup, ProgramIntrospector } from "./types.js";
