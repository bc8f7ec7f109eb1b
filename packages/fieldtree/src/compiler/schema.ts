import {
  getNamedType,
  isAbstractType,
  isCompositeType,
  isEnumType,
  isInterfaceType,
  isListType,
  isNonNullType,
  isObjectType,
  isScalarType,
  isUnionType,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
  type GraphQLCompositeType,
  type GraphQLField,
  type GraphQLSchema,
  type GraphQLType,
} from "graphql";
import { SchemaMismatchError, type Path } from "../core/errors";
import type { TypeRef } from "./types";

/**
 * Look up a field definition on a composite type, including the
 * introspection meta fields (__typename everywhere, __schema/__type on Query).
 */
export const getFieldDef = (
  schema: GraphQLSchema,
  parentType: GraphQLCompositeType,
  fieldName: string,
): GraphQLField<unknown, unknown> | undefined => {
  if (fieldName === TypeNameMetaFieldDef.name) return TypeNameMetaFieldDef;

  if (parentType === schema.getQueryType()) {
    if (fieldName === SchemaMetaFieldDef.name) return SchemaMetaFieldDef;
    if (fieldName === TypeMetaFieldDef.name) return TypeMetaFieldDef;
  }

  if (isObjectType(parentType) || isInterfaceType(parentType)) {
    return parentType.getFields()[fieldName];
  }

  return undefined;
};

/**
 * Unwrap a GraphQL output type into a TypeRef (named type, nullability per list level).
 */
export const toTypeRef = (type: GraphQLType, path: Path): TypeRef => {
  let current: GraphQLType = type;
  let nullable = true;
  let listDepth = 0;
  const itemNullable: boolean[] = [];

  for (let level = 0; ; level++) {
    let levelNullable = true;
    if (isNonNullType(current)) {
      levelNullable = false;
      current = current.ofType;
    }

    if (level === 0) {
      nullable = levelNullable;
    } else {
      itemNullable.push(levelNullable);
    }

    if (!isListType(current)) break;

    listDepth++;
    current = current.ofType;
  }

  const named = getNamedType(current);

  if (isScalarType(named)) {
    return { name: named.name, kind: "SCALAR", nullable, listDepth, itemNullable };
  }
  if (isEnumType(named)) {
    const enumValues = new Set(named.getValues().map(v => v.name));
    return { name: named.name, kind: "ENUM", nullable, listDepth, itemNullable, enumValues };
  }
  if (isObjectType(named)) {
    return { name: named.name, kind: "OBJECT", nullable, listDepth, itemNullable };
  }
  if (isInterfaceType(named)) {
    return { name: named.name, kind: "INTERFACE", nullable, listDepth, itemNullable };
  }
  if (isUnionType(named)) {
    return { name: named.name, kind: "UNION", nullable, listDepth, itemNullable };
  }

  throw new SchemaMismatchError(path, `"${named.name}" is not an output type`);
};

/**
 * Resolve a type condition (or field type) by name; it must be composite.
 */
export const getCompositeType = (
  schema: GraphQLSchema,
  typeName: string,
  path: Path,
): GraphQLCompositeType => {
  const type = schema.getType(typeName);
  if (!type) {
    throw new SchemaMismatchError(path, `unknown type "${typeName}"`);
  }
  if (!isCompositeType(type)) {
    throw new SchemaMismatchError(path, `type "${typeName}" cannot have a selection set`);
  }
  return type;
};

/**
 * Concrete object types an object of `type` may be at runtime.
 */
export const getPossibleTypeNames = (schema: GraphQLSchema, type: GraphQLCompositeType): Set<string> => {
  if (isAbstractType(type)) {
    const out = new Set<string>();
    const possible = schema.getPossibleTypes(type);
    for (let i = 0; i < possible.length; i++) out.add(possible[i].name);
    return out;
  }
  return new Set([type.name]);
};
