import { buildArgs } from "./lowering/args";
import type { CanonicalTree, Field } from "./types";

export const isCanonicalTree = (v: unknown): v is CanonicalTree => {
  return typeof v === "object" && v !== null && "kind" in v && v.kind === "CanonicalTree";
};

/**
 * Stable JSON stringify with sorted keys for consistent output.
 */
export const stableStringify = (object: unknown): string => {
  const walk = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    if (Array.isArray(value)) {
      return value.map(walk);
    }

    const result: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    for (let i = 0; i < keys.length; i++) {
      const key = keys[i];
      result[key] = walk(Reflect.get(value, key));
    }

    return result;
  };

  try {
    return JSON.stringify(walk(object)) ?? "";
  } catch {
    return "";
  }
};

/**
 * Build a field identity from its name and resolved arguments, e.g.:
 *   user({"id":"u1"})
 *
 * Fields without arguments (or whose arguments all resolve to undefined) are just the name.
 */
export const buildFieldKey = (field: Pick<Field, "fieldName" | "arguments">, variables: Readonly<Record<string, unknown>>): string => {
  if (field.arguments.length === 0) return field.fieldName;
  const args = stableStringify(buildArgs(field.arguments, variables));
  return args === "{}" ? field.fieldName : `${field.fieldName}(${args})`;
};
