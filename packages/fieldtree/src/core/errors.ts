/**
 * Error types for fieldtree
 */

export type PathSegment = string | number;
export type Path = readonly PathSegment[];

export type FieldTreeErrorCode =
  | "SchemaMismatch"
  | "DuplicateDeferLabel"
  | "FieldMergeConflict"
  | "FragmentMergeConflict"
  | "ScalarCoercionError"
  | "NonNullViolation"
  | "UnhandledTypeCondition"
  | "MissingRequiredField"
  | "MissingVariable"
  | "UnresolvablePatchPath"
  | "DuplicatePatch"
  | "IncompleteDelivery"
  | "DocumentError"
  | "UnexpectedValue";

/**
 * Render a path for messages, e.g. `computers.0.screen`
 */
export const formatPath = (path: Path): string => {
  return path.length === 0 ? "<root>" : path.join(".");
};

/**
 * Base class: every error carries a stable code and the path it refers to
 */
export class FieldTreeError extends Error {
  public readonly code: FieldTreeErrorCode;
  public readonly path: Path;

  constructor(code: FieldTreeErrorCode, message: string, path: Path = []) {
    super(message);
    this.name = "FieldTreeError";
    this.code = code;
    this.path = path;
  }
}

/**
 * A selected field or type condition does not exist in the schema
 */
export class SchemaMismatchError extends FieldTreeError {
  constructor(path: Path, detail: string) {
    super("SchemaMismatch", `Schema mismatch at ${formatPath(path)}: ${detail}`, path);
    this.name = "SchemaMismatchError";
  }
}

export class DuplicateDeferLabelError extends FieldTreeError {
  public readonly label: string;

  constructor(label: string, path: Path) {
    super("DuplicateDeferLabel", `Duplicate @defer label "${label}" at ${formatPath(path)}`, path);
    this.name = "DuplicateDeferLabelError";
    this.label = label;
  }
}

/**
 * Two fields share a response key but cannot be decoded by one shape
 */
export class FieldMergeConflictError extends FieldTreeError {
  public readonly responseKey: string;

  constructor(responseKey: string, reason: string, path: Path = [responseKey]) {
    super("FieldMergeConflict", `Cannot merge "${responseKey}" at ${formatPath(path)}: ${reason}`, path);
    this.name = "FieldMergeConflictError";
    this.responseKey = responseKey;
  }
}

export class FragmentMergeConflictError extends FieldTreeError {
  public readonly fragmentName: string;

  constructor(fragmentName: string, reason: string) {
    super("FragmentMergeConflict", `Cannot merge fragment "${fragmentName}": ${reason}`);
    this.name = "FragmentMergeConflictError";
    this.fragmentName = fragmentName;
  }
}

export class ScalarCoercionError extends FieldTreeError {
  public readonly typeName: string;

  constructor(typeName: string, path: Path, detail: string) {
    super("ScalarCoercionError", `Cannot coerce ${typeName} at ${formatPath(path)}: ${detail}`, path);
    this.name = "ScalarCoercionError";
    this.typeName = typeName;
  }
}

export class NonNullViolationError extends FieldTreeError {
  constructor(path: Path) {
    super("NonNullViolation", `Null value for non-null position ${formatPath(path)}`, path);
    this.name = "NonNullViolationError";
  }
}

export class UnhandledTypeConditionError extends FieldTreeError {
  public readonly typename: string;

  constructor(typename: string, path: Path) {
    super("UnhandledTypeCondition", `No selection handles type "${typename}" at ${formatPath(path)}`, path);
    this.name = "UnhandledTypeConditionError";
    this.typename = typename;
  }
}

export class MissingRequiredFieldError extends FieldTreeError {
  public readonly responseKey: string;

  constructor(path: Path) {
    super("MissingRequiredField", `Missing required field ${formatPath(path)}`, path);
    this.name = "MissingRequiredFieldError";
    this.responseKey = String(path[path.length - 1] ?? "");
  }
}

export class MissingVariableError extends FieldTreeError {
  public readonly variableName: string;

  constructor(variableName: string) {
    super("MissingVariable", `Variable "$${variableName}" is not provided and has no default`);
    this.name = "MissingVariableError";
    this.variableName = variableName;
  }
}

export class UnresolvablePatchPathError extends FieldTreeError {
  constructor(path: Path) {
    super("UnresolvablePatchPath", `Patch path ${formatPath(path)} does not exist in the result`, path);
    this.name = "UnresolvablePatchPathError";
  }
}

export class DuplicatePatchError extends FieldTreeError {
  public readonly label?: string;

  constructor(path: Path, label?: string) {
    const which = label === undefined ? "unlabeled patch" : `patch "${label}"`;
    super("DuplicatePatch", `Nothing is pending for ${which} at ${formatPath(path)}`, path);
    this.name = "DuplicatePatchError";
    this.label = label;
  }
}

export class IncompleteDeliveryError extends FieldTreeError {
  public readonly pending: readonly string[];

  constructor(pending: readonly string[]) {
    super("IncompleteDelivery", `Final patch received while still pending: ${pending.join(", ")}`);
    this.name = "IncompleteDeliveryError";
    this.pending = pending;
  }
}

/**
 * The document cannot be compiled (no operation, unknown fragment, cycles, warnings as errors)
 */
export class DocumentError extends FieldTreeError {
  constructor(message: string, path: Path = []) {
    super("DocumentError", message, path);
    this.name = "DocumentError";
  }
}

/**
 * A payload value has the wrong shape for its position (e.g. a string where an object is selected)
 */
export class UnexpectedValueError extends FieldTreeError {
  constructor(path: Path, expected: string) {
    super("UnexpectedValue", `Expected ${expected} at ${formatPath(path)}`, path);
    this.name = "UnexpectedValueError";
  }
}
