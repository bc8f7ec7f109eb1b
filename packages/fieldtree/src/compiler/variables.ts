import {
  Kind,
  print,
  valueFromASTUntyped,
  type DirectiveNode,
  type FragmentDefinitionNode,
  type OperationDefinitionNode,
  type SelectionSetNode,
  type ValueNode,
} from "graphql";
import { MissingVariableError } from "../core/errors";
import type { CanonicalTree, VariableDefinition } from "./types";

/**
 * Extract all variable names referenced in a ValueNode (recursively).
 */
const collectVarsFromValue = (node: ValueNode, out: Set<string>): void => {
  switch (node.kind) {
    case Kind.VARIABLE:
      out.add(node.name.value);
      break;
    case Kind.LIST:
      for (const v of node.values) collectVarsFromValue(v, out);
      break;
    case Kind.OBJECT:
      for (const f of node.fields) collectVarsFromValue(f.value, out);
      break;
  }
};

const collectVarsFromDirectives = (directives: readonly DirectiveNode[] | undefined, out: Set<string>): void => {
  if (!directives) return;
  for (const dir of directives) {
    for (const arg of dir.arguments || []) collectVarsFromValue(arg.value, out);
  }
};

/**
 * Collect all variable names from a SelectionSet AST (recursively):
 * field arguments plus @include/@skip/@defer arguments.
 */
export const collectVarsFromSelectionSet = (
  selectionSet: SelectionSetNode,
  fragmentsByName: ReadonlyMap<string, FragmentDefinitionNode>,
  visited = new Set<string>(),
  out = new Set<string>(),
): Set<string> => {
  for (const sel of selectionSet.selections) {
    collectVarsFromDirectives(sel.directives, out);

    if (sel.kind === Kind.FIELD) {
      for (const arg of sel.arguments || []) collectVarsFromValue(arg.value, out);
      if (sel.selectionSet) {
        collectVarsFromSelectionSet(sel.selectionSet, fragmentsByName, visited, out);
      }
    } else if (sel.kind === Kind.INLINE_FRAGMENT) {
      collectVarsFromSelectionSet(sel.selectionSet, fragmentsByName, visited, out);
    } else {
      const fragName = sel.name.value;
      if (visited.has(fragName)) continue;
      visited.add(fragName);
      const frag = fragmentsByName.get(fragName);
      if (frag) {
        collectVarsFromSelectionSet(frag.selectionSet, fragmentsByName, visited, out);
      }
    }
  }

  return out;
};

/**
 * Read the operation's variable definitions; defaults become plain values.
 */
export const readVariableDefinitions = (operation: OperationDefinitionNode): VariableDefinition[] => {
  const defs = operation.variableDefinitions || [];
  return defs.map(def => {
    const out: VariableDefinition = { name: def.variable.name.value, type: print(def.type) };
    if (def.defaultValue) {
      out.defaultValue = valueFromASTUntyped(def.defaultValue);
    }
    return out;
  });
};

/**
 * Resolve the variables a tree needs: provided values win (an explicit null
 * counts as provided), then declared defaults. Anything else is missing.
 */
export const resolveVariables = (
  tree: Pick<CanonicalTree, "variables" | "variableDefinitions">,
  variables: Readonly<Record<string, unknown>> = {},
): Record<string, unknown> => {
  const resolved: Record<string, unknown> = { ...variables };

  const defaults = new Map<string, VariableDefinition>();
  for (const def of tree.variableDefinitions) defaults.set(def.name, def);

  const needed = new Set<string>(tree.variables);
  for (const def of tree.variableDefinitions) needed.add(def.name);

  for (const name of needed) {
    if (Object.prototype.hasOwnProperty.call(variables, name) && variables[name] !== undefined) continue;

    const def = defaults.get(name);
    if (def && def.defaultValue !== undefined) {
      resolved[name] = def.defaultValue;
      continue;
    }

    throw new MissingVariableError(name);
  }

  return resolved;
};
