import { compileTree, isCanonicalTree, type CanonicalTree, type CompileOptions } from "../compiler";
import type { DocumentNode, GraphQLSchema } from "graphql";

export type PlannerInstance = ReturnType<typeof createPlanner>;

export type PlannerOptions = Partial<CompileOptions> & {
  schema: GraphQLSchema;
  catchAll: boolean;
};

type GetTreeOpts = Partial<CompileOptions>;

/** option key for the per-document cache; only options that change the tree take part */
const optionsKey = (opts: CompileOptions): string => {
  return [
    opts.operationName ?? "",
    opts.fragmentName ?? "",
    opts.catchAll ? "1" : "0",
    opts.addTypename === false ? "0" : "1",
    opts.warnOnDeprecatedUsages === false ? "0" : "1",
    opts.failOnWarnings ? "1" : "0",
  ].join("|");
};

export const createPlanner = ({ schema, ...defaults }: PlannerOptions) => {
  // Cache for DocumentNode → (options key → tree)
  const docCache = new WeakMap<DocumentNode, Map<string, CanonicalTree>>();
  // Cache for string docs → key = doc + "::" + options key
  const strCache = new Map<string, CanonicalTree>();

  const getTree = (
    docOrTree: DocumentNode | CanonicalTree | string,
    opts?: GetTreeOpts,
  ): CanonicalTree => {
    // Already compiled? just return it
    if (isCanonicalTree(docOrTree)) return docOrTree;

    const options: CompileOptions = { ...defaults, ...opts, catchAll: opts?.catchAll ?? defaults.catchAll };
    const key = optionsKey(options);

    if (typeof docOrTree === "string") {
      const strKey = `${docOrTree}::${key}`;
      const hit = strCache.get(strKey);
      if (hit) return hit;

      const tree = compileTree(docOrTree, schema, options);
      strCache.set(strKey, tree);
      return tree;
    }

    // DocumentNode path
    let inner = docCache.get(docOrTree);
    if (!inner) {
      inner = new Map<string, CanonicalTree>();
      docCache.set(docOrTree, inner);
    }

    const hit = inner.get(key);
    if (hit) return hit;

    const tree = compileTree(docOrTree, schema, options);
    inner.set(key, tree);
    return tree;
  };

  return { getTree };
};
