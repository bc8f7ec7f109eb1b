import { ScalarCoercionError, type Path } from "../core/errors";
import type { TypeRef } from "../compiler/types";

/**
 * Coercion pair for one custom scalar: wire value -> runtime value and back.
 * Either side may throw to reject a value.
 */
export type ScalarCodec = {
  parse: (value: unknown) => unknown;
  serialize: (value: unknown) => unknown;
};

export type ScalarRegistry = {
  parse: (type: TypeRef, value: unknown, path: Path) => unknown;
  serialize: (type: TypeRef, value: unknown, path: Path) => unknown;
  has: (typeName: string) => boolean;
};

type BuiltinCheck = (value: unknown) => boolean;

const BUILTINS = new Map<string, BuiltinCheck>([
  ["Int", value => typeof value === "number" && Number.isInteger(value)],
  ["Float", value => typeof value === "number" && Number.isFinite(value)],
  ["String", value => typeof value === "string"],
  ["Boolean", value => typeof value === "boolean"],
  ["ID", value => typeof value === "string" || (typeof value === "number" && Number.isInteger(value))],
]);

const describeValue = (value: unknown): string => {
  if (Array.isArray(value)) return "a list";
  if (value === null) return "null";
  return typeof value === "object" ? "an object" : `${typeof value} ${JSON.stringify(value)}`;
};

const checkLeaf = (type: TypeRef, value: unknown, path: Path): boolean => {
  const builtin = BUILTINS.get(type.name);
  if (builtin) {
    if (!builtin(value)) {
      throw new ScalarCoercionError(type.name, path, `got ${describeValue(value)}`);
    }
    return true;
  }

  if (type.kind === "ENUM") {
    if (typeof value !== "string" || !type.enumValues?.has(value)) {
      throw new ScalarCoercionError(type.name, path, `${describeValue(value)} is not a value of the enum`);
    }
    return true;
  }

  return false;
};

const run = (typeName: string, path: Path, fn: () => unknown): unknown => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ScalarCoercionError) throw error;
    const detail = error instanceof Error ? error.message : String(error);
    throw new ScalarCoercionError(typeName, path, detail);
  }
};

/**
 * Build the leaf coercion registry used by decode and encode.
 * Built-in scalars check their JavaScript type and pass through, enums check
 * membership, custom scalars go through `codecs` (passthrough when none is registered).
 */
export const createScalarRegistry = (codecs: Readonly<Record<string, ScalarCodec>> = {}): ScalarRegistry => {
  const custom = new Map(Object.entries(codecs));

  const parse = (type: TypeRef, value: unknown, path: Path): unknown => {
    if (checkLeaf(type, value, path)) return value;
    const codec = custom.get(type.name);
    return codec ? run(type.name, path, () => codec.parse(value)) : value;
  };

  const serialize = (type: TypeRef, value: unknown, path: Path): unknown => {
    if (checkLeaf(type, value, path)) return value;
    const codec = custom.get(type.name);
    return codec ? run(type.name, path, () => codec.serialize(value)) : value;
  };

  const has = (typeName: string): boolean => custom.has(typeName) || BUILTINS.has(typeName);

  return { parse, serialize, has };
};

export const defaultScalars = createScalarRegistry();
