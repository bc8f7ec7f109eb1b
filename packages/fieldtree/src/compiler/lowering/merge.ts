import { FieldMergeConflictError, FragmentMergeConflictError, type Path } from "../../core/errors";
import { mergeConditions } from "./directives";
import { createField, createFragment, unionMaps, unionSets } from "./nodes";
import type { Deferral, Field, Fragment, TypeRef } from "../types";

/* ────────────────────────────────────────────────────────────────────────── */
/* helpers                                                                   */
/* ────────────────────────────────────────────────────────────────────────── */

const isLeaf = (type: TypeRef): boolean => type.kind === "SCALAR" || type.kind === "ENUM";

/** returns why two types cannot share one response shape, or undefined when they can */
const shapeConflict = (a: TypeRef, b: TypeRef): string | undefined => {
  if (isLeaf(a) !== isLeaf(b)) {
    return `"${a.name}" and "${b.name}" are not both leaf or both composite types`;
  }
  if (isLeaf(a) && a.name !== b.name) {
    return `leaf types "${a.name}" and "${b.name}" differ`;
  }
  if (a.nullable !== b.nullable) {
    return "nullability differs";
  }
  if (a.listDepth !== b.listDepth) {
    return `list depth ${a.listDepth} and ${b.listDepth} differ`;
  }
  for (let i = 0; i < a.itemNullable.length; i++) {
    if (a.itemNullable[i] !== b.itemNullable[i]) {
      return `list item nullability differs at depth ${i + 1}`;
    }
  }
  return undefined;
};

/**
 * Deferrals of two origins are never combined: same deferral is kept,
 * a non-deferred side wins (the value arrives with the base payload),
 * two different deferrals are a conflict.
 */
const mergeDeferral = (
  a: Deferral | undefined,
  b: Deferral | undefined,
): { deferral: Deferral | undefined; conflict?: string } => {
  if (!a || !b) return { deferral: undefined };
  if (a.id === b.id) return { deferral: a };
  return {
    deferral: undefined,
    conflict: `deferred by both "${a.label ?? a.id}" and "${b.label ?? b.id}"`,
  };
};

/* ────────────────────────────────────────────────────────────────────────── */
/* fields                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

const mergeField = (a: Field, b: Field, path: Path): Field => {
  if (a === b) return a;

  const at = path.concat(a.responseKey);

  if (a.fieldName !== b.fieldName) {
    throw new FieldMergeConflictError(a.responseKey, `"${a.fieldName}" and "${b.fieldName}" are different fields`, at);
  }
  if (a.argSignature !== b.argSignature) {
    throw new FieldMergeConflictError(a.responseKey, `arguments (${a.argSignature}) and (${b.argSignature}) differ`, at);
  }

  const shape = shapeConflict(a.type, b.type);
  if (shape) {
    throw new FieldMergeConflictError(a.responseKey, shape, at);
  }

  const { deferral, conflict } = mergeDeferral(a.deferral, b.deferral);
  if (conflict) {
    throw new FieldMergeConflictError(a.responseKey, conflict, at);
  }

  const selectionSet = mergeFields(a.selectionSet, b.selectionSet, at);
  const fragments = mergeFragments(a.fragments, selectionSet, b.fragments, at);

  return createField({
    responseKey: a.responseKey,
    fieldName: a.fieldName,
    typeName: a.typeName,
    type: a.type,
    arguments: a.arguments,
    argSignature: a.argSignature,
    selectionSet,
    fragments,
    accessors: unionMaps(a.accessors, b.accessors),
    origins: unionSets(a.origins, b.origins),
    conditions: mergeConditions(a.conditions, b.conditions),
    deferral,
    deprecationReason: a.deprecationReason,
  });
};

/**
 * Unify two sibling field lists by responseKey.
 * Each field of `a` takes the first unconsumed field of `b` with the same key;
 * unmatched fields of `b` follow in order. Inputs are never mutated.
 */
export const mergeFields = (a: readonly Field[], b: readonly Field[], path: Path = []): Field[] => {
  if (b.length === 0) return a.slice();
  if (a.length === 0) return b.slice();

  // candidate positions in `b` per responseKey, in order
  const candidates = new Map<string, number[]>();
  for (let i = 0; i < b.length; i++) {
    const key = b[i].responseKey;
    const list = candidates.get(key);
    if (list) list.push(i);
    else candidates.set(key, [i]);
  }

  const consumed = new Set<number>();
  const out: Field[] = [];

  for (let i = 0; i < a.length; i++) {
    const field = a[i];
    const list = candidates.get(field.responseKey);
    const match = list?.find(index => !consumed.has(index));

    if (match === undefined) {
      out.push(field);
      continue;
    }

    consumed.add(match);
    out.push(mergeField(field, b[match], path));
  }

  for (let i = 0; i < b.length; i++) {
    if (!consumed.has(i)) out.push(b[i]);
  }

  return out;
};

/* ────────────────────────────────────────────────────────────────────────── */
/* fragments                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/** push the current parent fields into a fragment so its shape stays self-sufficient */
const pushDown = (fragment: Fragment, parentFields: readonly Field[], path: Path): Fragment => {
  if (parentFields.length === 0) return fragment;
  return createFragment({
    name: fragment.name,
    typeCondition: fragment.typeCondition,
    possibleTypes: fragment.possibleTypes,
    conditional: fragment.conditional,
    selectionSet: mergeFields(fragment.selectionSet, parentFields, path),
    deferral: fragment.deferral,
    origins: fragment.origins,
  });
};

/**
 * Merge the fragments attached at one position.
 * - named fragments match by name; inline fragments never match each other
 * - matched: fragment-to-fragment overlap first, then the merged parent fields
 * - unmatched (either side): parent fields re-pushed, the parent may have grown
 */
export const mergeFragments = (
  existing: readonly Fragment[],
  parentFields: readonly Field[],
  incoming: readonly Fragment[],
  path: Path = [],
): Fragment[] => {
  const consumed = new Set<number>();
  const out: Fragment[] = [];

  for (let i = 0; i < existing.length; i++) {
    const fragment = existing[i];

    let match = -1;
    if (fragment.name !== undefined) {
      match = incoming.findIndex((other, index) => !consumed.has(index) && other.name === fragment.name);
    }

    if (match < 0) {
      out.push(pushDown(fragment, parentFields, path));
      continue;
    }

    consumed.add(match);
    const other = incoming[match];
    const name = fragment.name ?? "";

    if (fragment.typeCondition !== other.typeCondition) {
      throw new FragmentMergeConflictError(
        name,
        `type conditions "${fragment.typeCondition}" and "${other.typeCondition}" differ`,
      );
    }

    const { deferral, conflict } = mergeDeferral(fragment.deferral, other.deferral);
    if (conflict) {
      throw new FragmentMergeConflictError(name, conflict);
    }

    out.push(createFragment({
      name: fragment.name,
      typeCondition: fragment.typeCondition,
      possibleTypes: fragment.possibleTypes,
      conditional: fragment.conditional,
      selectionSet: mergeFields(mergeFields(fragment.selectionSet, other.selectionSet, path), parentFields, path),
      deferral,
      origins: unionSets(fragment.origins, other.origins),
    }));
  }

  for (let i = 0; i < incoming.length; i++) {
    if (!consumed.has(i)) out.push(pushDown(incoming[i], parentFields, path));
  }

  return out;
};
