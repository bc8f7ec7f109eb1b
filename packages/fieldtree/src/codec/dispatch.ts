import { TYPENAME_FIELD } from "../compiler/constants";
import { MissingRequiredFieldError, UnhandledTypeConditionError, type Path } from "../core/errors";
import type { SelectionScope } from "../compiler/types";

/** The part of a scope or variant that decode and encode walk. */
export type Selection = Pick<SelectionScope, "selectionSet" | "selectionMap" | "selectionIndex">;

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const hasOwn = (object: Record<string, unknown>, key: string): boolean => {
  return Object.prototype.hasOwnProperty.call(object, key);
};

/**
 * Pick the selection for one object. Polymorphic scopes dispatch on
 * `__typename` (or `fallbackTypename` when the object carries none); a
 * typename without a variant falls back to the plain selection only when
 * `catchAll` is on.
 */
export const selectVariant = (
  scope: SelectionScope,
  value: Record<string, unknown>,
  path: Path,
  catchAll: boolean,
  fallbackTypename?: string,
): Selection => {
  if (!scope.variants) return scope;

  const typename = hasOwn(value, TYPENAME_FIELD) ? value[TYPENAME_FIELD] : fallbackTypename;
  if (typeof typename !== "string") {
    throw new MissingRequiredFieldError(path.concat(TYPENAME_FIELD));
  }

  const variant = scope.variants.get(typename);
  if (variant) return variant;
  if (catchAll) return scope;

  throw new UnhandledTypeConditionError(typename, path);
};
