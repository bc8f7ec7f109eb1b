import { FieldTreeError, MissingRequiredFieldError, NonNullViolationError, UnexpectedValueError, type Path } from "../core/errors";
import { resolveVariables } from "../compiler/variables";
import { isDeferred, isIncluded, type Variables } from "./conditions";
import { isRecord, selectVariant, type Selection } from "./dispatch";
import { defaultScalars, type ScalarRegistry } from "./scalars";
import type { CanonicalTree, Deferral, Field, SelectionScope } from "../compiler/types";

export type CodecOptions = {
  variables?: Variables;
  scalars?: ScalarRegistry;
  /** typename of the root object when the payload does not carry `__typename` */
  typename?: string;
};

/**
 * Fields of one deferral that were absent from a decoded object and will be
 * delivered by a later patch.
 */
export type PendingDeferral = {
  id: string;
  label?: string;
  /** enclosing deferral on the same object: this one is owed only once that one is grafted */
  parent?: string;
  path: Path;
  object: Record<string, unknown>;
  fields: readonly Field[];
  /** canonical positions of the object's selection, for grafting in order */
  selectionIndex: ReadonlyMap<string, number>;
};

export type DecodeResult = {
  data: Record<string, unknown> | null;
  errors: FieldTreeError[];
  deferred: PendingDeferral[];
};

export type DecodeContext = {
  variables: Variables;
  scalars: ScalarRegistry;
  catchAll: boolean;
  errors: FieldTreeError[];
  deferred: PendingDeferral[];
};

export const createDecodeContext = (
  tree: Pick<CanonicalTree, "catchAll">,
  variables: Variables,
  scalars: ScalarRegistry = defaultScalars,
): DecodeContext => ({
  variables,
  scalars,
  catchAll: tree.catchAll,
  errors: [],
  deferred: [],
});

/* ────────────────────────────────────────────────────────────────────────── */
/* values                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Decode one position of a field (depth 0 is the field itself, then one per list level).
 * An error below a nullable position is recorded and the position becomes null;
 * pending deferrals registered under it are dropped with it.
 */
const decodeAt = (field: Field, depth: number, raw: unknown, path: Path, ctx: DecodeContext): unknown => {
  const type = field.type;
  const nullable = depth === 0 ? type.nullable : type.itemNullable[depth - 1];
  const mark = ctx.deferred.length;

  try {
    if (raw === null || raw === undefined) {
      if (nullable) return null;
      throw new NonNullViolationError(path);
    }

    if (depth < type.listDepth) {
      if (!Array.isArray(raw)) {
        throw new UnexpectedValueError(path, "a list");
      }
      const out = new Array<unknown>(raw.length);
      for (let i = 0; i < raw.length; i++) {
        out[i] = decodeAt(field, depth + 1, raw[i], path.concat(i), ctx);
      }
      return out;
    }

    if (type.kind === "SCALAR" || type.kind === "ENUM") {
      return ctx.scalars.parse(type, raw, path);
    }

    return decodeObject(field, raw, path, ctx);
  } catch (error) {
    if (!nullable || !(error instanceof FieldTreeError)) throw error;
    ctx.errors.push(error);
    ctx.deferred.length = mark;
    return null;
  }
};

export const decodeField = (field: Field, raw: unknown, path: Path, ctx: DecodeContext): unknown => {
  return decodeAt(field, 0, raw, path, ctx);
};

/* ────────────────────────────────────────────────────────────────────────── */
/* objects                                                                   */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Decode a keyed object against a resolved selection.
 * Input keys are matched by responseKey in any order; the output follows
 * canonical order. Unknown keys are ignored, excluded fields omitted, deferred
 * fields registered as pending (a nested deferral names its enclosing one as `parent`).
 */
export const decodeSelection = (
  selection: Selection,
  raw: Record<string, unknown>,
  path: Path,
  ctx: DecodeContext,
): Record<string, unknown> => {
  const fields = selection.selectionSet;
  const slots = new Array<unknown>(fields.length);
  const present = new Array<boolean>(fields.length).fill(false);

  for (const key of Object.keys(raw)) {
    const index = selection.selectionIndex.get(key);
    if (index === undefined) continue;

    const field = fields[index];
    if (!isIncluded(field.conditions, ctx.variables)) continue;
    if (isDeferred(field.deferral, ctx.variables)) continue;

    const value = raw[key];
    if (value === undefined) continue;

    slots[index] = decodeAt(field, 0, value, path.concat(key), ctx);
    present[index] = true;
  }

  const out: Record<string, unknown> = {};
  const groups = new Map<string, { deferral: Deferral; fields: Field[] }>();

  for (let i = 0; i < fields.length; i++) {
    const field = fields[i];
    if (!isIncluded(field.conditions, ctx.variables)) continue;

    if (isDeferred(field.deferral, ctx.variables)) {
      const group = groups.get(field.deferral.id);
      if (group) group.fields.push(field);
      else groups.set(field.deferral.id, { deferral: field.deferral, fields: [field] });
      continue;
    }

    if (present[i]) {
      out[field.responseKey] = slots[i];
      continue;
    }

    if (!field.type.nullable) {
      throw new MissingRequiredFieldError(path.concat(field.responseKey));
    }
    out[field.responseKey] = null;
  }

  for (const { deferral, fields: deferredFields } of groups.values()) {
    ctx.deferred.push({
      id: deferral.id,
      label: deferral.label,
      parent: deferral.parent !== undefined && groups.has(deferral.parent) ? deferral.parent : undefined,
      path,
      object: out,
      fields: deferredFields,
      selectionIndex: selection.selectionIndex,
    });
  }

  return out;
};

export const decodeObject = (
  scope: SelectionScope,
  raw: unknown,
  path: Path,
  ctx: DecodeContext,
  fallbackTypename?: string,
): Record<string, unknown> => {
  if (!isRecord(raw)) {
    throw new UnexpectedValueError(path, "an object");
  }
  const selection = selectVariant(scope, raw, path, ctx.catchAll, fallbackTypename);
  return decodeSelection(selection, raw, path, ctx);
};

/* ────────────────────────────────────────────────────────────────────────── */
/* Public: decodeResponse(tree, payload, options)                            */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Decode a response `data` payload against a canonical tree.
 * Variables are resolved first (`MissingVariable` is thrown before any decode).
 * Decode errors are collected in `errors`; when nothing up to the root is
 * nullable, `data` is null.
 */
export const decodeResponse = (
  tree: CanonicalTree,
  payload: unknown,
  options: CodecOptions = {},
): DecodeResult => {
  const variables = resolveVariables(tree, options.variables);

  if (payload === null || payload === undefined) {
    return { data: null, errors: [], deferred: [] };
  }

  const ctx = createDecodeContext(tree, variables, options.scalars);

  let data: Record<string, unknown> | null;
  try {
    data = decodeObject(tree, payload, [], ctx, options.typename);
  } catch (error) {
    if (!(error instanceof FieldTreeError)) throw error;
    ctx.errors.push(error);
    ctx.deferred.length = 0;
    data = null;
  }

  return { data, errors: ctx.errors, deferred: ctx.deferred };
};
