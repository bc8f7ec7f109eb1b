import type { Field, Fragment, Variant } from "../types";

export type FieldParts = Omit<Field, "selectionMap" | "selectionIndex">;
export type FragmentParts = Omit<Fragment, "selectionMap">;

const EMPTY_MAP: ReadonlyMap<string, never> = new Map<string, never>();

/**
 * Index a selection by responseKey, once per node.
 */
export const indexByResponseKey = (
  fields: readonly Field[],
): { selectionMap: ReadonlyMap<string, Field>; selectionIndex: ReadonlyMap<string, number> } => {
  if (fields.length === 0) {
    return { selectionMap: EMPTY_MAP, selectionIndex: EMPTY_MAP };
  }
  const selectionMap = new Map<string, Field>();
  const selectionIndex = new Map<string, number>();
  for (let i = 0; i < fields.length; i++) {
    selectionMap.set(fields[i].responseKey, fields[i]);
    selectionIndex.set(fields[i].responseKey, i);
  }
  return { selectionMap, selectionIndex };
};

export const createField = (parts: FieldParts): Field => {
  const { selectionMap, selectionIndex } = indexByResponseKey(parts.selectionSet);
  return { ...parts, selectionMap, selectionIndex };
};

export const createFragment = (parts: FragmentParts): Fragment => {
  const { selectionMap } = indexByResponseKey(parts.selectionSet);
  return { ...parts, selectionMap };
};

export const createVariant = (
  typeCondition: string,
  selectionSet: readonly Field[],
  fragments: readonly string[],
): Variant => {
  const { selectionMap, selectionIndex } = indexByResponseKey(selectionSet);
  return { typeCondition, selectionSet, selectionMap, selectionIndex, fragments };
};

/** identity used in accessor tables: the fragment name, or `on Type` for inline fragments */
export const fragmentIdentity = (fragment: { name?: string; typeCondition: string }): string => {
  return fragment.name ?? `on ${fragment.typeCondition}`;
};

/** synthetic accessor handle: `heroDetails` for HeroDetails, `asDroid` for `... on Droid` */
export const fragmentAccessor = (fragment: { name?: string; typeCondition: string }): string => {
  if (fragment.name !== undefined) {
    return fragment.name.charAt(0).toLowerCase() + fragment.name.slice(1);
  }
  return `as${fragment.typeCondition}`;
};

export const unionSets = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): ReadonlySet<T> => {
  if (a === b || b.size === 0) return a;
  if (a.size === 0) return b;
  const out = new Set(a);
  for (const v of b) out.add(v);
  return out.size === a.size ? a : out;
};

export const unionMaps = <K, V>(a: ReadonlyMap<K, V>, b: ReadonlyMap<K, V>): ReadonlyMap<K, V> => {
  if (a === b || b.size === 0) return a;
  if (a.size === 0) return b;
  const out = new Map(a);
  for (const [k, v] of b) {
    if (!out.has(k)) out.set(k, v);
  }
  return out;
};
