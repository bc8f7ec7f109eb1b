import { MissingRequiredFieldError, NonNullViolationError, UnexpectedValueError, type Path } from "../core/errors";
import { resolveVariables } from "../compiler/variables";
import { isDeferred, isIncluded, type Variables } from "./conditions";
import { hasOwn, isRecord, selectVariant } from "./dispatch";
import { defaultScalars, type ScalarRegistry } from "./scalars";
import type { CodecOptions } from "./decode";
import type { CanonicalTree, Field, SelectionScope } from "../compiler/types";

type EncodeContext = {
  variables: Variables;
  scalars: ScalarRegistry;
  catchAll: boolean;
};

const encodeAt = (field: Field, depth: number, value: unknown, path: Path, ctx: EncodeContext): unknown => {
  const type = field.type;
  const nullable = depth === 0 ? type.nullable : type.itemNullable[depth - 1];

  if (value === null || value === undefined) {
    if (nullable) return null;
    throw new NonNullViolationError(path);
  }

  if (depth < type.listDepth) {
    if (!Array.isArray(value)) {
      throw new UnexpectedValueError(path, "a list");
    }
    return value.map((item, i) => encodeAt(field, depth + 1, item, path.concat(i), ctx));
  }

  if (type.kind === "SCALAR" || type.kind === "ENUM") {
    return ctx.scalars.serialize(type, value, path);
  }

  return encodeObject(field, value, path, ctx);
};

const encodeObject = (
  scope: SelectionScope,
  value: unknown,
  path: Path,
  ctx: EncodeContext,
  fallbackTypename?: string,
): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new UnexpectedValueError(path, "an object");
  }

  const selection = selectVariant(scope, value, path, ctx.catchAll, fallbackTypename);
  const out: Record<string, unknown> = {};

  for (const field of selection.selectionSet) {
    if (!isIncluded(field.conditions, ctx.variables)) continue;

    const key = field.responseKey;
    const at = path.concat(key);
    const present = hasOwn(value, key) && value[key] !== undefined;

    if (!present) {
      if (isDeferred(field.deferral, ctx.variables)) continue;
      if (!field.type.nullable) throw new MissingRequiredFieldError(at);
      out[key] = null;
      continue;
    }

    out[key] = encodeAt(field, 0, value[key], at, ctx);
  }

  return out;
};

/* ────────────────────────────────────────────────────────────────────────── */
/* Public: encodeResponse(tree, value, options)                              */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Serialise a value tree into a wire payload. Keys are written in canonical
 * order whatever the order the value was built in; any violation throws.
 */
export const encodeResponse = (
  tree: CanonicalTree,
  value: unknown,
  options: CodecOptions = {},
): Record<string, unknown> => {
  const ctx: EncodeContext = {
    variables: resolveVariables(tree, options.variables),
    scalars: options.scalars ?? defaultScalars,
    catchAll: tree.catchAll,
  };

  return encodeObject(tree, value, [], ctx, options.typename);
};
