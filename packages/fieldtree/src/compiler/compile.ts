import {
  Kind,
  parse,
  print,
  type DocumentNode,
  type FragmentDefinitionNode,
  type GraphQLCompositeType,
  type GraphQLSchema,
  type OperationDefinitionNode,
} from "graphql";
import { DocumentError, SchemaMismatchError } from "../core/errors";
import { devWarn } from "../core/instrumentation";
import { getCompositeType } from "./schema";
import { createDeferRegistry } from "./lowering/directives";
import { indexByResponseKey } from "./lowering/nodes";
import { lowerSelectionSet, type LowerContext } from "./lowering/select";
import { addTypenameToDocument } from "./lowering/typename";
import { buildVariants, createSealer } from "./lowering/variants";
import { fingerprintTree, hashFingerprint } from "./fingerprint";
import { isCanonicalTree } from "./utils";
import { collectVarsFromSelectionSet, readVariableDefinitions } from "./variables";
import type { CanonicalTree, CompileOptions, OpKind, VariableDefinition } from "./types";

/** Build a Map of fragment name -> fragment definition for lowering. */
const indexFragments = (doc: DocumentNode): Map<string, FragmentDefinitionNode> => {
  const m = new Map<string, FragmentDefinitionNode>();
  for (let i = 0; i < doc.definitions.length; i++) {
    const d = doc.definitions[i];
    if (d.kind === Kind.FRAGMENT_DEFINITION) {
      m.set(d.name.value, d);
    }
  }
  return m;
};

const opRootType = (schema: GraphQLSchema, op: OperationDefinitionNode): GraphQLCompositeType => {
  const type = op.operation === "mutation"
    ? schema.getMutationType()
    : op.operation === "subscription"
      ? schema.getSubscriptionType()
      : schema.getQueryType();

  if (!type) {
    throw new SchemaMismatchError([], `schema has no ${op.operation} root type`);
  }
  return type;
};

/** The compiled root: an operation, or a single fragment definition. */
type Target = {
  operation: OpKind;
  name?: string;
  rootType: GraphQLCompositeType;
  origin: string;
  definition: OperationDefinitionNode | FragmentDefinitionNode;
  variableDefinitions: VariableDefinition[];
};

const pickOperation = (
  document: DocumentNode,
  operationName: string | undefined,
): OperationDefinitionNode | undefined => {
  const operations = document.definitions.filter(
    (d): d is OperationDefinitionNode => d.kind === Kind.OPERATION_DEFINITION,
  );
  if (operations.length === 0) return undefined;

  if (operationName !== undefined) {
    const op = operations.find(o => o.name?.value === operationName);
    if (!op) {
      const names = operations.map(o => o.name?.value ?? "<anonymous>").join(", ");
      throw new DocumentError(`Operation "${operationName}" not found. Available: [${names}]`);
    }
    return op;
  }

  if (operations.length > 1) {
    const names = operations.map(o => o.name?.value ?? "<anonymous>").join(", ");
    throw new DocumentError(`Multiple operations found [${names}], specify operationName`);
  }
  return operations[0];
};

const pickFragment = (
  fragmentsByName: Map<string, FragmentDefinitionNode>,
  fragmentName: string | undefined,
): FragmentDefinitionNode => {
  const names = Array.from(fragmentsByName.keys()).join(", ");

  if (fragmentsByName.size === 0) {
    throw new DocumentError("No operation found in document");
  }

  if (fragmentName !== undefined) {
    const frag = fragmentsByName.get(fragmentName);
    if (!frag) {
      throw new DocumentError(`Fragment "${fragmentName}" not found. Available: [${names}]`);
    }
    return frag;
  }

  if (fragmentsByName.size > 1) {
    throw new DocumentError(`Multiple fragments found [${names}], specify fragmentName`);
  }

  const [frag] = fragmentsByName.values();
  return frag;
};

const resolveTarget = (
  document: DocumentNode,
  fragmentsByName: Map<string, FragmentDefinitionNode>,
  schema: GraphQLSchema,
  options: CompileOptions,
): Target => {
  const operation = pickOperation(document, options.operationName);

  if (operation) {
    const name = operation.name?.value;
    return {
      operation: operation.operation,
      name,
      rootType: opRootType(schema, operation),
      origin: `${operation.operation} ${name ?? "<anonymous>"}`,
      definition: operation,
      variableDefinitions: readVariableDefinitions(operation),
    };
  }

  const frag = pickFragment(fragmentsByName, options.fragmentName);
  return {
    operation: "fragment",
    name: frag.name.value,
    rootType: getCompositeType(schema, frag.typeCondition.name.value, []),
    origin: frag.name.value,
    definition: frag,
    variableDefinitions: [],
  };
};

/* ────────────────────────────────────────────────────────────────────────── */
/* Public: compileTree(document, schema, options)                            */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Compile a document into a canonical field tree.
 * - If called with a precompiled tree → returned as-is (pass-through).
 * - If called with a string → parsed to DocumentNode first.
 * - If the document contains an OperationDefinition → compiled as an operation
 *   (`operationName` selects among several).
 * - Else it is compiled as a fragment (`fragmentName` selects among several).
 */
export const compileTree = (
  documentOrStringOrTree: string | DocumentNode | CanonicalTree,
  schema: GraphQLSchema,
  options: CompileOptions,
): CanonicalTree => {
  // Precompiled tree? done.
  if (isCanonicalTree(documentOrStringOrTree)) {
    return documentOrStringOrTree;
  }

  // String? parse first.
  const source: DocumentNode =
    typeof documentOrStringOrTree === "string"
      ? parse(documentOrStringOrTree)
      : documentOrStringOrTree;

  const document = options.addTypename === false ? source : addTypenameToDocument(source);
  const fragmentsByName = indexFragments(document);
  const target = resolveTarget(document, fragmentsByName, schema, options);

  const ctx: LowerContext = {
    schema,
    fragmentsByName,
    defer: createDeferRegistry(),
    warnings: [],
    warnOnDeprecatedUsages: options.warnOnDeprecatedUsages !== false,
    visiting: new Set(target.operation === "fragment" ? [target.origin] : []),
    possibleTypes: new Map(),
  };

  const lowered = lowerSelectionSet(target.definition.selectionSet, target.rootType, ctx, {
    origin: target.origin,
    conditions: [],
    path: [],
  });

  if (ctx.warnings.length > 0) {
    if (options.failOnWarnings) {
      throw new DocumentError(ctx.warnings.map(w => w.message).join("\n"));
    }
    for (const warning of ctx.warnings) {
      devWarn(`${warning.message} at ${warning.path.join(".")}`);
    }
  }

  // Seal: attach variants to every polymorphic selection, root included
  const sealer = createSealer();
  const selectionSet = sealer.sealFields(lowered.fields, []);
  const fragments = lowered.fragments.map(fragment => sealer.sealFragment(fragment, []));
  const variants = buildVariants(lowered.fragments, lowered.fields, [], sealer.sealFields);
  const { selectionMap, selectionIndex } = indexByResponseKey(selectionSet);

  const rootTypename = target.rootType.name;
  const selectionFingerprint = fingerprintTree(selectionSet, fragments, target.operation, rootTypename);
  const variables = collectVarsFromSelectionSet(target.definition.selectionSet, fragmentsByName);

  return {
    kind: "CanonicalTree",
    operation: target.operation,
    name: target.name,
    rootTypename,
    typeName: rootTypename,
    selectionSet,
    selectionMap,
    selectionIndex,
    fragments,
    accessors: lowered.accessors,
    variants,
    networkQuery: print(document),
    id: hashFingerprint(selectionFingerprint),
    selectionFingerprint,
    variableDefinitions: target.variableDefinitions,
    variables: Array.from(variables),
    deferLabels: Array.from(ctx.defer.labels.keys()),
    catchAll: options.catchAll,
    warnings: ctx.warnings,
  };
};
