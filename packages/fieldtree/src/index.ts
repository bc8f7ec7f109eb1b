export { compileTree, isCanonicalTree, mergeFields, mergeFragments, buildFieldKey, resolveVariables } from "./compiler";
export type {
  CanonicalTree,
  CompileOptions,
  CompileWarning,
  Condition,
  Conditions,
  Deferral,
  Field,
  Fragment,
  NamedTypeKind,
  OpKind,
  SelectionScope,
  TypeRef,
  Variant,
  VariableDefinition,
} from "./compiler";

export { createPlanner } from "./core/planner";
export type { PlannerInstance, PlannerOptions } from "./core/planner";

export { decodeResponse, encodeResponse, readFragment, createScalarRegistry } from "./codec";
export type { CodecOptions, DecodeResult, PendingDeferral, ScalarCodec, ScalarRegistry } from "./codec";

export { createIncrementalMerger } from "./incremental";
export type { IncrementalMerger, IncrementalPatch, MergerState, ConsumeOptions } from "./incremental";

export {
  FieldTreeError,
  SchemaMismatchError,
  DuplicateDeferLabelError,
  FieldMergeConflictError,
  FragmentMergeConflictError,
  ScalarCoercionError,
  NonNullViolationError,
  UnhandledTypeConditionError,
  MissingRequiredFieldError,
  MissingVariableError,
  UnresolvablePatchPathError,
  DuplicatePatchError,
  IncompleteDeliveryError,
  DocumentError,
  UnexpectedValueError,
} from "./core/errors";
export type { FieldTreeErrorCode, Path, PathSegment } from "./core/errors";
