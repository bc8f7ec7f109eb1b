import { valueSignature } from "./lowering/args";
import type { Field, Fragment } from "./types";

/**
 * Fast 32-bit FNV-1a hash for strings.
 * Produces stable numeric IDs from selection fingerprints.
 */
const fnv1a32 = (str: string): number => {
  let hash = 2166136261; // FNV offset basis
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, 16777619); // FNV prime
  }
  return hash >>> 0; // unsigned 32-bit
};

const fingerprintFragment = (fragment: Fragment): string => {
  const head = fragment.name ? `...${fragment.name}` : "...";
  const deferred = fragment.deferral ? `@defer(${fragment.deferral.id})` : "";
  return `${head}@${fragment.typeCondition}${deferred}{${fingerprintFields(fragment.selectionSet)}}`;
};

/**
 * Build a stable fingerprint for a field subtree.
 * Includes: responseKey, fieldName, argument signature, inclusion and deferral
 * annotations, and recursively child selections and fragments.
 */
export const fingerprintField = (field: Field): string => {
  const parts: string[] = [field.responseKey, field.fieldName];

  if (field.argSignature) {
    parts.push(`(${field.argSignature})`);
  }

  if (field.conditions.length > 0) {
    const alternatives = field.conditions.map(conjunction => {
      return conjunction.map(c => `${c.kind}:${valueSignature(c.if)}`).join("&");
    });
    parts.push(`?${alternatives.join("|")}`);
  }

  if (field.deferral) {
    parts.push(`@defer(${field.deferral.id})`);
  }

  if (field.selectionSet.length > 0) {
    parts.push(`{${fingerprintFields(field.selectionSet)}}`);
  }

  if (field.fragments.length > 0) {
    parts.push(`[${field.fragments.map(fingerprintFragment).join(",")}]`);
  }

  return parts.join(":");
};

/** Sort by responseKey, then fieldName, for order-insensitive fingerprints */
export const fingerprintFields = (fields: readonly Field[]): string => {
  const sorted = fields.slice().sort((a, b) => {
    const cmp = a.responseKey.localeCompare(b.responseKey);
    return cmp !== 0 ? cmp : a.fieldName.localeCompare(b.fieldName);
  });
  return sorted.map(fingerprintField).join(",");
};

/**
 * Build a stable fingerprint for the entire tree root.
 * Includes operation and rootTypename to prevent collisions between different roots.
 */
export const fingerprintTree = (
  root: readonly Field[],
  fragments: readonly Fragment[],
  operation: string,
  rootTypename: string,
): string => {
  const attached = fragments.length > 0 ? `[${fragments.map(fingerprintFragment).join(",")}]` : "";
  return `${operation}:${rootTypename}:{${fingerprintFields(root)}}${attached}`;
};

/**
 * Compute a stable numeric ID from a fingerprint string.
 */
export const hashFingerprint = (fingerprint: string): number => {
  return fnv1a32(fingerprint);
};
