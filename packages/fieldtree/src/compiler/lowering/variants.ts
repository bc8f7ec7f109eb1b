import type { Path } from "../../core/errors";
import { mergeFields } from "./merge";
import { createField, createFragment, createVariant, fragmentIdentity } from "./nodes";
import type { Field, Fragment, Variant } from "../types";

/**
 * Build the tagged variants of one selection. Once a selection has a
 * conditional fragment, every concrete typename some attached fragment covers
 * gets a variant: the merge of the conditional fragments that apply (exact
 * type-condition matches first, then abstract ones), or the plain `fields`
 * when only unconditional fragments (e.g. a named fragment on the parent's
 * interface) cover it.
 */
export const buildVariants = (
  fragments: readonly Fragment[],
  fields: readonly Field[],
  path: Path,
  seal: (fields: readonly Field[], path: Path) => Field[],
): ReadonlyMap<string, Variant> | undefined => {
  if (!fragments.some(fragment => fragment.conditional)) return undefined;

  const typenames = new Set<string>();
  for (let pass = 0; pass < 2; pass++) {
    for (let i = 0; i < fragments.length; i++) {
      if (fragments[i].conditional !== (pass === 0)) continue;
      for (const typename of fragments[i].possibleTypes) typenames.add(typename);
    }
  }

  const variants = new Map<string, Variant>();

  for (const typename of typenames) {
    const exact: Fragment[] = [];
    const abstract: Fragment[] = [];
    const covering: Fragment[] = [];

    for (let i = 0; i < fragments.length; i++) {
      const fragment = fragments[i];
      if (!fragment.possibleTypes.has(typename)) continue;
      if (!fragment.conditional) covering.push(fragment);
      else if (fragment.typeCondition === typename) exact.push(fragment);
      else abstract.push(fragment);
    }

    const applicable = exact.concat(abstract);
    const identities = applicable.concat(covering).map(fragmentIdentity);

    if (applicable.length === 0) {
      variants.set(typename, createVariant(typename, seal(fields, path), identities));
      continue;
    }

    let merged: readonly Field[] = applicable[0].selectionSet;
    for (let i = 1; i < applicable.length; i++) {
      merged = mergeFields(merged, applicable[i].selectionSet, path);
    }

    variants.set(typename, createVariant(typename, seal(merged, path), identities));
  }

  return variants;
};

/**
 * Final pass of tree construction: attach variants to every polymorphic
 * selection, bottom-up. Nodes shared between positions are sealed once.
 */
export const createSealer = () => {
  const sealed = new WeakMap<Field, Field>();

  const sealFragment = (fragment: Fragment, path: Path): Fragment => {
    return createFragment({
      name: fragment.name,
      typeCondition: fragment.typeCondition,
      possibleTypes: fragment.possibleTypes,
      conditional: fragment.conditional,
      selectionSet: sealFields(fragment.selectionSet, path),
      deferral: fragment.deferral,
      origins: fragment.origins,
    });
  };

  const sealField = (field: Field, path: Path): Field => {
    const hit = sealed.get(field);
    if (hit) return hit;

    const at = path.concat(field.responseKey);
    const result = createField({
      responseKey: field.responseKey,
      fieldName: field.fieldName,
      typeName: field.typeName,
      type: field.type,
      arguments: field.arguments,
      argSignature: field.argSignature,
      selectionSet: sealFields(field.selectionSet, at),
      fragments: field.fragments.map(fragment => sealFragment(fragment, at)),
      accessors: field.accessors,
      origins: field.origins,
      conditions: field.conditions,
      deferral: field.deferral,
      deprecationReason: field.deprecationReason,
      variants: buildVariants(field.fragments, field.selectionSet, at, sealFields),
    });

    sealed.set(field, result);
    sealed.set(result, result);
    return result;
  };

  const sealFields = (fields: readonly Field[], path: Path): Field[] => {
    return fields.map(field => sealField(field, path));
  };

  return { sealFields, sealFragment };
};
