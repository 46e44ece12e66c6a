/**
 * Module execution errors.
 */

export class ModuleExecutionError extends Error {
  public readonly moduleId: string;

  constructor(message: string, moduleId: string) {
    super(message);
    this.name = "ModuleExecutionError";
    this.moduleId = moduleId;
  }
}

export class ModuleNotImplementedError extends ModuleExecutionError {
  constructor(moduleId: string, implemented: readonly string[]) {
    super(
      `Module: ${moduleId} is not implemented. Implemented modules: [${implemented.join(", ")}]`,
      moduleId
    );
    this.name = "ModuleNotImplementedError";
  }
}

export class InvalidModeError extends ModuleExecutionError {
  constructor(moduleId: string, mode: unknown, validModes: readonly string[]) {
    super(
      `Invalid SEC mode: ${JSON.stringify(mode)}. Expected one of: ${validModes.join(", ")}`,
      moduleId
    );
    this.name = "InvalidModeError";
  }
}

export class MalformedColumnSpecError extends ModuleExecutionError {
  public readonly label: string;

  constructor(moduleId: string, label: string, value: unknown) {
    super(
      `SEC column '${label}' must resolve to [min_kDa, max_kDa], got ${JSON.stringify(value)}`,
      moduleId
    );
    this.name = "MalformedColumnSpecError";
    this.label = label;
  }
}

export class RunCancelledError extends ModuleExecutionError {
  constructor(moduleId: string) {
    super(`Module ${moduleId} was cancelled`, moduleId);
    this.name = "RunCancelledError";
  }
}
