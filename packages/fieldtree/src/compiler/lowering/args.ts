import { Kind, type ArgumentNode, type ValueNode } from "graphql";

/* ────────────────────────────────────────────────────────────────────────── */
/* Signature builders                                                         */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Build a stable signature for a value AST node.
 * For variables, we use the variable name (not runtime value).
 */
export const valueSignature = (value: ValueNode): string => {
  switch (value.kind) {
    case Kind.VARIABLE:
      return `$${value.name.value}`;
    case Kind.INT:
    case Kind.FLOAT:
    case Kind.ENUM:
      return value.value;
    case Kind.STRING:
      return JSON.stringify(value.value);
    case Kind.BOOLEAN:
      return String(value.value);
    case Kind.NULL:
      return "null";
    case Kind.LIST:
      return `[${value.values.map(valueSignature).join(",")}]`;
    case Kind.OBJECT: {
      const fields = value.fields
        .slice()
        .sort((a, b) => a.name.value.localeCompare(b.name.value))
        .map(f => `${f.name.value}:${valueSignature(f.value)}`)
        .join(",");
      return `{${fields}}`;
    }
  }
};

/**
 * Build a stable signature for argument AST (structural, based on variable names).
 * Fast path: returns "" for empty args without allocations.
 */
export const buildArgSignature = (args: readonly ArgumentNode[] | undefined): string => {
  if (!args || args.length === 0) return "";

  if (args.length === 1) {
    const arg = args[0];
    return `${arg.name.value}:${valueSignature(arg.value)}`;
  }

  const sorted = args.slice().sort((a, b) => a.name.value.localeCompare(b.name.value));
  const parts: string[] = [];

  for (let i = 0; i < sorted.length; i++) {
    const arg = sorted[i];
    parts.push(`${arg.name.value}:${valueSignature(arg.value)}`);
  }

  return parts.join(",");
};

/* ────────────────────────────────────────────────────────────────────────── */
/* Evaluation                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Evaluate a GraphQL ValueNode to a JS value using resolved variables.
 * Unknown variables evaluate to undefined.
 */
export const evaluateValueNode = (
  valueNode: ValueNode,
  variables: Readonly<Record<string, unknown>>,
): unknown => {
  switch (valueNode.kind) {
    case Kind.NULL:
      return null;
    case Kind.INT:
    case Kind.FLOAT:
      return Number(valueNode.value);
    case Kind.STRING:
    case Kind.ENUM:
    case Kind.BOOLEAN:
      return valueNode.value;
    case Kind.VARIABLE:
      return variables[valueNode.name.value];
    case Kind.LIST: {
      const length = valueNode.values.length;
      const output = new Array<unknown>(length);
      for (let i = 0; i < length; i++) {
        output[i] = evaluateValueNode(valueNode.values[i], variables);
      }
      return output;
    }
    case Kind.OBJECT: {
      const output: Record<string, unknown> = {};
      const fields = valueNode.fields;
      for (let i = 0; i < fields.length; i++) {
        const field = fields[i];
        output[field.name.value] = evaluateValueNode(field.value, variables);
      }
      return output;
    }
  }
};

/**
 * Resolve field arguments to plain values, in AST order, omitting undefined.
 */
export const buildArgs = (
  args: readonly ArgumentNode[],
  variables: Readonly<Record<string, unknown>>,
): Record<string, unknown> => {
  const output: Record<string, unknown> = {};
  for (let i = 0; i < args.length; i++) {
    const evaluated = evaluateValueNode(args[i].value, variables);
    if (evaluated !== undefined) {
      output[args[i].name.value] = evaluated;
    }
  }
  return output;
};
