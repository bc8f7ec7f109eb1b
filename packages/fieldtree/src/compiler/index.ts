export { compileTree } from "./compile";
export { isCanonicalTree, buildFieldKey, stableStringify } from "./utils";
export { mergeFields, mergeFragments } from "./lowering/merge";
export { resolveVariables } from "./variables";
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
} from "./types";
