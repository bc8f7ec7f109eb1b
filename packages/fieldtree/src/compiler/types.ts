import type { ArgumentNode, ValueNode } from "graphql";

export type OpKind = "query" | "mutation" | "subscription" | "fragment";

export type NamedTypeKind = "SCALAR" | "ENUM" | "OBJECT" | "INTERFACE" | "UNION";

/**
 * Resolved output type of a field.
 * - `nullable` is the outermost nullability
 * - `itemNullable[i]` is the nullability of list level i + 1 (outer to inner)
 */
export type TypeRef = {
  name: string;
  kind: NamedTypeKind;
  nullable: boolean;
  listDepth: number;
  itemNullable: readonly boolean[];
  enumValues?: ReadonlySet<string>;             // only for ENUM leaves
};

/** A single @include / @skip annotation. */
export type Condition = {
  kind: "include" | "skip";
  if: ValueNode;
};

/**
 * Static inclusion annotations as a disjunction of conjunctions.
 * `[]` means the field is unconditional.
 */
export type Conditions = readonly (readonly Condition[])[];

export type Deferral = {
  id: string;                                   // label, or the directive position when unlabeled
  label?: string;
  typeCondition?: string;
  if?: ValueNode;                               // variable-bound `if`, evaluated at decode time
  parent?: string;                              // id of the deferral this one is nested in
};

/**
 * Shared shape of everything that decodes one object: the tree root,
 * each composite field, and each polymorphic variant.
 */
export type SelectionScope = {
  typeName: string;
  selectionSet: readonly Field[];
  selectionMap: ReadonlyMap<string, Field>;     // responseKey -> field
  selectionIndex: ReadonlyMap<string, number>;  // responseKey -> canonical position
  fragments: readonly Fragment[];
  accessors: ReadonlyMap<string, string>;       // fragment identity -> accessor handle
  variants?: ReadonlyMap<string, Variant>;      // concrete typename -> variant (polymorphic only)
};

export type Field = SelectionScope & {
  responseKey: string;                          // alias || name
  fieldName: string;                            // schema field name
  type: TypeRef;
  arguments: readonly ArgumentNode[];
  argSignature: string;                         // structural, variable names not values
  origins: ReadonlySet<string>;
  conditions: Conditions;
  deferral?: Deferral;
  deprecationReason?: string;
};

export type Fragment = {
  name?: string;                                // absent for inline fragments
  typeCondition: string;
  possibleTypes: ReadonlySet<string>;
  conditional: boolean;                         // does not cover every parent type
  selectionSet: readonly Field[];
  selectionMap: ReadonlyMap<string, Field>;
  deferral?: Deferral;
  origins: ReadonlySet<string>;
};

export type Variant = {
  typeCondition: string;
  selectionSet: readonly Field[];
  selectionMap: ReadonlyMap<string, Field>;
  selectionIndex: ReadonlyMap<string, number>;
  fragments: readonly string[];                 // identities of the fragments it merges
};

export type VariableDefinition = {
  name: string;
  type: string;
  defaultValue?: unknown;
};

export type CompileWarning = {
  message: string;
  path: readonly string[];
};

export type CompileOptions = {
  /** Whether polymorphic selections accept typenames no fragment covers. */
  catchAll: boolean;
  addTypename?: boolean;
  warnOnDeprecatedUsages?: boolean;
  failOnWarnings?: boolean;
  operationName?: string;
  fragmentName?: string;
};

export type CanonicalTree = SelectionScope & {
  kind: "CanonicalTree";
  operation: OpKind;
  name?: string;
  rootTypename: string;

  /** Network-safe document text: __typename added where the tree expects it. */
  networkQuery: string;

  /** Stable, selection-shape ID. */
  id: number;
  selectionFingerprint: string;

  variableDefinitions: readonly VariableDefinition[];
  /** Every variable name referenced by arguments, conditions or deferrals. */
  variables: readonly string[];
  deferLabels: readonly string[];
  catchAll: boolean;
  warnings: readonly CompileWarning[];
};
