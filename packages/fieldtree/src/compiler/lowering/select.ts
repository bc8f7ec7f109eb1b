import {
  Kind,
  type DirectiveNode,
  type FieldNode,
  type FragmentDefinitionNode,
  type GraphQLCompositeType,
  type GraphQLSchema,
  type SelectionSetNode,
} from "graphql";
import { DocumentError, SchemaMismatchError, type Path } from "../../core/errors";
import { getCompositeType, getFieldDef, getPossibleTypeNames, toTypeRef } from "../schema";
import { buildArgSignature } from "./args";
import { parseConditions, parseDeferral, scopeConditions, type DeferRegistry } from "./directives";
import { mergeFields, mergeFragments } from "./merge";
import { createField, createFragment, fragmentAccessor, fragmentIdentity, unionMaps } from "./nodes";
import type { CompileWarning, Condition, Deferral, Field, Fragment } from "../types";

export type LowerContext = {
  schema: GraphQLSchema;
  fragmentsByName: Map<string, FragmentDefinitionNode>;
  defer: DeferRegistry;
  warnings: CompileWarning[];
  warnOnDeprecatedUsages: boolean;
  /** fragment names on the current spread stack */
  visiting: Set<string>;
  possibleTypes: Map<string, Set<string>>;
};

/** where a selection set sits: its origin, inherited annotations and response path */
export type LowerScope = {
  origin: string;
  conditions: readonly Condition[];
  deferral?: Deferral;
  path: Path;
};

export type Lowered = {
  fields: Field[];
  fragments: Fragment[];
  accessors: ReadonlyMap<string, string>;
};

type FragmentInput = {
  name?: string;
  typeName: string;
  selectionSet: SelectionSetNode;
  directives: readonly DirectiveNode[] | undefined;
  origin: string;
};

const EMPTY_ACCESSORS: ReadonlyMap<string, string> = new Map();

/* ────────────────────────────────────────────────────────────────────────── */
/* helpers                                                                   */
/* ────────────────────────────────────────────────────────────────────────── */

const possibleTypesOf = (ctx: LowerContext, type: GraphQLCompositeType): Set<string> => {
  let hit = ctx.possibleTypes.get(type.name);
  if (!hit) {
    hit = getPossibleTypeNames(ctx.schema, type);
    ctx.possibleTypes.set(type.name, hit);
  }
  return hit;
};

const covers = (outer: ReadonlySet<string>, inner: ReadonlySet<string>): boolean => {
  for (const name of inner) {
    if (!outer.has(name)) return false;
  }
  return true;
};

const intersect = (a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> => {
  const out = new Set<string>();
  for (const name of a) {
    if (b.has(name)) out.add(name);
  }
  return out;
};

const inlineOrigin = (typeName: string, node: { loc?: { startToken: { line: number; column: number } } }): string => {
  const start = node.loc?.startToken;
  return start ? `on ${typeName}@${start.line}:${start.column}` : `on ${typeName}`;
};

const isCompositeKind = (kind: string): boolean => kind === "OBJECT" || kind === "INTERFACE" || kind === "UNION";

/** combine one selection's contribution into the accumulated level */
const combine = (acc: Lowered, part: Lowered, path: Path): Lowered => {
  const fields = mergeFields(acc.fields, part.fields, path);
  return {
    fields,
    fragments: mergeFragments(acc.fragments, fields, part.fragments, path),
    accessors: unionMaps(acc.accessors, part.accessors),
  };
};

/* ────────────────────────────────────────────────────────────────────────── */
/* fields                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

const lowerField = (
  node: FieldNode,
  parentType: GraphQLCompositeType,
  ctx: LowerContext,
  scope: LowerScope,
): Field => {
  const responseKey = node.alias?.value || node.name.value;
  const fieldName = node.name.value;
  const path = scope.path.concat(responseKey);

  const def = getFieldDef(ctx.schema, parentType, fieldName);
  if (!def) {
    throw new SchemaMismatchError(path, `type "${parentType.name}" has no field "${fieldName}"`);
  }

  const type = toTypeRef(def.type, path);
  const composite = isCompositeKind(type.kind);

  if (composite && !node.selectionSet) {
    throw new SchemaMismatchError(path, `field "${fieldName}" of type "${type.name}" needs a selection set`);
  }
  if (!composite && node.selectionSet) {
    throw new SchemaMismatchError(path, `leaf field "${fieldName}" of type "${type.name}" cannot have a selection set`);
  }

  if (def.deprecationReason && ctx.warnOnDeprecatedUsages) {
    ctx.warnings.push({
      message: `Use of deprecated field "${parentType.name}.${fieldName}": ${def.deprecationReason}`,
      path: path.map(String),
    });
  }

  let child: Lowered = { fields: [], fragments: [], accessors: EMPTY_ACCESSORS };
  if (node.selectionSet) {
    const childType = getCompositeType(ctx.schema, type.name, path);
    // children start a fresh scope: annotations of this field do not flow into them
    child = lowerSelectionSet(node.selectionSet, childType, ctx, { origin: scope.origin, conditions: [], path });
  }

  return createField({
    responseKey,
    fieldName,
    typeName: type.name,
    type,
    arguments: node.arguments ?? [],
    argSignature: buildArgSignature(node.arguments),
    selectionSet: child.fields,
    fragments: child.fragments,
    accessors: child.accessors,
    origins: new Set([scope.origin]),
    conditions: scopeConditions(scope.conditions, parseConditions(node.directives)),
    deferral: scope.deferral,
    deprecationReason: def.deprecationReason ?? undefined,
  });
};

/* ────────────────────────────────────────────────────────────────────────── */
/* fragments                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Lower an inline fragment or spread at one level.
 * A fragment covering every possible parent type is flattened into the parent
 * fields (and still attached when named, for its accessor); otherwise it is
 * attached as a conditional fragment and its own nested fragments are lifted
 * next to it.
 */
const lowerFragment = (
  input: FragmentInput,
  parentType: GraphQLCompositeType,
  ctx: LowerContext,
  scope: LowerScope,
): Lowered => {
  const type = getCompositeType(ctx.schema, input.typeName, scope.path);
  const parentPossible = possibleTypesOf(ctx, parentType);
  const fragmentPossible = possibleTypesOf(ctx, type);
  const conditional = !covers(fragmentPossible, parentPossible);

  const deferral = parseDeferral(input.directives, input.typeName, ctx.defer, scope.path, scope.deferral) ?? scope.deferral;
  const conditions = scope.conditions.concat(parseConditions(input.directives));

  const inner = lowerSelectionSet(input.selectionSet, type, ctx, {
    origin: input.origin,
    conditions,
    deferral,
    path: scope.path,
  });

  const lifted = inner.fragments.map(fragment => createFragment({
    name: fragment.name,
    typeCondition: fragment.typeCondition,
    possibleTypes: intersect(fragment.possibleTypes, parentPossible),
    conditional: fragment.conditional || conditional,
    selectionSet: fragment.selectionSet,
    deferral: fragment.deferral,
    origins: fragment.origins,
  }));

  const own = { name: input.name, typeCondition: input.typeName };
  const attach = conditional || input.name !== undefined;

  const fragments: Fragment[] = [];
  let accessors = inner.accessors;

  if (attach) {
    fragments.push(createFragment({
      name: input.name,
      typeCondition: input.typeName,
      possibleTypes: intersect(fragmentPossible, parentPossible),
      conditional,
      selectionSet: inner.fields,
      deferral,
      origins: new Set([input.origin]),
    }));
    accessors = unionMaps(new Map([[fragmentIdentity(own), fragmentAccessor(own)]]), accessors);
  }

  for (let i = 0; i < lifted.length; i++) fragments.push(lifted[i]);

  return {
    fields: conditional ? [] : inner.fields,
    fragments,
    accessors,
  };
};

/* ────────────────────────────────────────────────────────────────────────── */
/* main lowering                                                              */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Lower a GraphQL SelectionSet into fields and attached fragments for one level,
 * resolving every field against `parentType`.
 */
export const lowerSelectionSet = (
  selectionSet: SelectionSetNode,
  parentType: GraphQLCompositeType,
  ctx: LowerContext,
  scope: LowerScope,
): Lowered => {
  let acc: Lowered = { fields: [], fragments: [], accessors: EMPTY_ACCESSORS };

  for (const sel of selectionSet.selections) {
    if (sel.kind === Kind.FIELD) {
      const field = lowerField(sel, parentType, ctx, scope);
      acc = combine(acc, { fields: [field], fragments: [], accessors: EMPTY_ACCESSORS }, scope.path);
      continue;
    }

    if (sel.kind === Kind.INLINE_FRAGMENT) {
      const typeName = sel.typeCondition?.name.value ?? parentType.name;
      const part = lowerFragment({
        typeName,
        selectionSet: sel.selectionSet,
        directives: sel.directives,
        origin: inlineOrigin(typeName, sel),
      }, parentType, ctx, scope);
      acc = combine(acc, part, scope.path);
      continue;
    }

    if (sel.kind === Kind.FRAGMENT_SPREAD) {
      const name = sel.name.value;
      const def = ctx.fragmentsByName.get(name);
      if (!def) {
        throw new DocumentError(`Unknown fragment "${name}"`, scope.path);
      }
      if (ctx.visiting.has(name)) {
        throw new DocumentError(`Fragment "${name}" spreads itself`, scope.path);
      }

      ctx.visiting.add(name);
      const part = lowerFragment({
        name,
        typeName: def.typeCondition.name.value,
        selectionSet: def.selectionSet,
        directives: sel.directives,
        origin: name,
      }, parentType, ctx, scope);
      ctx.visiting.delete(name);

      acc = combine(acc, part, scope.path);
    }
  }

  return acc;
};
