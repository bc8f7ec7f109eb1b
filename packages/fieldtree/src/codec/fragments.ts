import { TYPENAME_FIELD } from "../compiler/constants";
import { DocumentError } from "../core/errors";
import { fragmentAccessor, fragmentIdentity } from "../compiler/lowering/nodes";
import { hasOwn, isRecord } from "./dispatch";
import type { Fragment, SelectionScope } from "../compiler/types";

const findFragment = (scope: SelectionScope, identity: string): Fragment | undefined => {
  return scope.fragments.find(fragment => {
    return fragmentIdentity(fragment) === identity || fragmentAccessor(fragment) === identity;
  });
};

/**
 * Read one attached fragment's data out of a decoded object.
 * `identity` is the fragment name, `on Type` for an inline fragment, or its accessor
 * handle (`heroDetails`, `asDroid`). Returns undefined when the object's typename
 * does not satisfy the fragment.
 */
export const readFragment = (
  scope: SelectionScope,
  value: unknown,
  identity: string,
): Record<string, unknown> | undefined => {
  const fragment = findFragment(scope, identity);
  if (!fragment) {
    const known = Array.from(scope.accessors.keys()).join(", ");
    throw new DocumentError(`No fragment "${identity}" on ${scope.typeName}. Available: [${known}]`);
  }

  if (!isRecord(value)) return undefined;

  if (fragment.conditional) {
    const typename = value[TYPENAME_FIELD];
    if (typeof typename !== "string" || !fragment.possibleTypes.has(typename)) return undefined;
  }

  const out: Record<string, unknown> = {};
  for (const field of fragment.selectionSet) {
    if (hasOwn(value, field.responseKey)) {
      out[field.responseKey] = value[field.responseKey];
    }
  }
  return out;
};
