import { Kind, type DirectiveNode } from "graphql";
import { DEFER_DIRECTIVE, INCLUDE_DIRECTIVE, SKIP_DIRECTIVE } from "../constants";
import { DocumentError, DuplicateDeferLabelError, type Path } from "../../core/errors";
import { valueSignature } from "./args";
import type { Condition, Conditions, Deferral } from "../types";

/**
 * Per-compilation bookkeeping for @defer: labels must be unique across the
 * operation, but one directive reached through repeated spreads is the same deferral.
 */
export type DeferRegistry = {
  labels: Map<string, DirectiveNode>;
  ids: WeakMap<DirectiveNode, string>;
  count: number;
};

export const createDeferRegistry = (): DeferRegistry => ({
  labels: new Map(),
  ids: new WeakMap(),
  count: 0,
});

/** read @include(if:) / @skip(if:) into a conjunction; constant-true annotations are dropped */
export const parseConditions = (directives: readonly DirectiveNode[] | undefined): Condition[] => {
  const out: Condition[] = [];
  if (!directives) return out;

  for (let i = 0; i < directives.length; i++) {
    const dir = directives[i];
    const name = dir.name.value;
    if (name !== INCLUDE_DIRECTIVE && name !== SKIP_DIRECTIVE) continue;

    const arg = dir.arguments?.find(a => a.name.value === "if");
    if (!arg) continue;

    if (arg.value.kind === Kind.BOOLEAN) {
      // @include(if: true) and @skip(if: false) never exclude anything
      if (name === INCLUDE_DIRECTIVE && arg.value.value) continue;
      if (name === SKIP_DIRECTIVE && !arg.value.value) continue;
    }

    out.push({ kind: name === INCLUDE_DIRECTIVE ? "include" : "skip", if: arg.value });
  }

  return out;
};

/** AND an enclosing scope's conjunction with a field's own annotations */
export const scopeConditions = (scope: readonly Condition[], own: readonly Condition[]): Conditions => {
  if (scope.length === 0 && own.length === 0) return [];
  return [scope.concat(own)];
};

const conjunctionSignature = (conjunction: readonly Condition[]): string => {
  return conjunction.map(c => `${c.kind}:${valueSignature(c.if)}`).join("&");
};

/** OR two condition sets; an unconditional side makes the result unconditional */
export const mergeConditions = (a: Conditions, b: Conditions): Conditions => {
  if (a.length === 0 || b.length === 0) return [];

  const seen = new Set<string>();
  const out: (readonly Condition[])[] = [];

  for (const conjunction of a.concat(b)) {
    const sig = conjunctionSignature(conjunction);
    if (seen.has(sig)) continue;
    seen.add(sig);
    out.push(conjunction);
  }

  return out;
};

/**
 * Read @defer(label:, if:) on an inline fragment or spread.
 * `if: false` disables the deferral; a variable-bound `if` is kept for decode time.
 * A deferral inside another one on the same object records it as `parent`.
 */
export const parseDeferral = (
  directives: readonly DirectiveNode[] | undefined,
  typeCondition: string | undefined,
  registry: DeferRegistry,
  path: Path,
  enclosing?: Deferral,
): Deferral | undefined => {
  const dir = directives?.find(d => d.name.value === DEFER_DIRECTIVE);
  if (!dir) return undefined;

  let label: string | undefined;
  let condition: Deferral["if"];

  for (const arg of dir.arguments || []) {
    if (arg.name.value === "label") {
      if (arg.value.kind !== Kind.STRING) {
        throw new DocumentError(`@defer label must be a string literal at ${path.join(".") || "<root>"}`, path);
      }
      label = arg.value.value;
    } else if (arg.name.value === "if") {
      if (arg.value.kind === Kind.BOOLEAN) {
        if (!arg.value.value) return undefined;
      } else {
        condition = arg.value;
      }
    }
  }

  if (label !== undefined) {
    const seen = registry.labels.get(label);
    if (seen && seen !== dir) {
      throw new DuplicateDeferLabelError(label, path);
    }
    registry.labels.set(label, dir);
  }

  let id = registry.ids.get(dir);
  if (!id) {
    id = label ?? `defer:${registry.count++}`;
    registry.ids.set(dir, id);
  }

  const parent = enclosing && enclosing.id !== id ? enclosing.id : undefined;
  return { id, label, typeCondition, if: condition, parent };
};
