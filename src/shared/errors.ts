/**
 * Error types for logtune.
 *
 * Malformed invocations (bad bracket grammar, unknown levels, function-scoped
 * overrides that cannot be honoured) are fatal. A namespace whose module does
 * not exist is a per-namespace miss: it is reported and skipped.
 */

export class LogtuneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogtuneError";
  }
}

/** Bracketed namespace notation that does not follow the grammar. */
export class NamespaceSyntaxError extends LogtuneError {
  /** The full namespace spec being expanded. */
  readonly namespace: string;

  constructor(namespace: string, detail: string) {
    super(`"${namespace}" looks like a bracketed namespace declaration but ${detail}`);
    this.name = "NamespaceSyntaxError";
    this.namespace = namespace;
  }
}

export class UnknownLevelError extends LogtuneError {
  readonly levelName: string;

  constructor(levelName: string, reason?: string) {
    super(reason ?? `Unknown logging level "${levelName}"`);
    this.name = "UnknownLevelError";
    this.levelName = levelName;
  }
}

export class UnresolvedModuleError extends LogtuneError {
  /** Fully qualified namespace that matched neither a module nor a module + function. */
  readonly namespace: string;

  constructor(namespace: string) {
    super(`Module not found: "${namespace}"`);
    this.name = "UnresolvedModuleError";
    this.namespace = namespace;
  }
}

export class NoClassesInModuleError extends LogtuneError {
  readonly moduleName: string;

  constructor(moduleName: string) {
    super(`"${moduleName}" has no classes!`);
    this.name = "NoClassesInModuleError";
    this.moduleName = moduleName;
  }
}

export class FunctionNotFoundError extends LogtuneError {
  readonly functionName: string;
  readonly moduleName: string;

  constructor(functionName: string, moduleName: string) {
    super(`Can't find "${functionName}" within "${moduleName}"!`);
    this.name = "FunctionNotFoundError";
    this.functionName = functionName;
    this.moduleName = moduleName;
  }
}

/** The name exists on a class but is a plain data member. */
export class NotAFunctionError extends LogtuneError {
  readonly functionName: string;
  readonly moduleName: string;

  constructor(functionName: string, moduleName: string) {
    super(`"${functionName}" should be a function within "${moduleName}"!`);
    this.name = "NotAFunctionError";
    this.functionName = functionName;
    this.moduleName = moduleName;
  }
}
