import {
  DuplicatePatchError,
  IncompleteDeliveryError,
  UnexpectedValueError,
  UnresolvablePatchPathError,
  type FieldTreeError,
  type Path,
} from "../core/errors";
import { devWarn } from "../core/instrumentation";
import { resolveVariables } from "../compiler/variables";
import { indexByResponseKey } from "../compiler/lowering/nodes";
import {
  createDecodeContext,
  decodeField,
  decodeResponse,
  decodeSelection,
  type CodecOptions,
  type DecodeContext,
  type PendingDeferral,
} from "../codec/decode";
import { hasOwn, isRecord } from "../codec/dispatch";
import { createArena, type ArenaEntry, type PendingGroup } from "./arena";
import type { CanonicalTree, Field } from "../compiler/types";

export type IncrementalPatch = {
  path: Path;
  label?: string;
  data: unknown;
  isFinal?: boolean;
};

export type MergerState = "pending" | "complete" | "incomplete";

export type ConsumeOptions = {
  signal?: AbortSignal;
};

export type IncrementalMerger = ReturnType<typeof createIncrementalMerger>;

/* ────────────────────────────────────────────────────────────────────────── */
/* helpers                                                                   */
/* ────────────────────────────────────────────────────────────────────────── */

/** patch data is decoded with the deferral lifted: the fields are no longer owed */
const undeferred = (field: Field): Field => ({ ...field, deferral: undefined });

/** re-insert keys so a grafted object keeps canonical order */
const reorder = (object: Record<string, unknown>, selectionIndex: ReadonlyMap<string, number>): void => {
  const keys = Object.keys(object);
  const position = (key: string): number => selectionIndex.get(key) ?? Number.MAX_SAFE_INTEGER;
  const sorted = keys.slice().sort((a, b) => position(a) - position(b));

  const values = new Map<string, unknown>();
  for (const key of keys) {
    values.set(key, object[key]);
    delete object[key];
  }
  for (const key of sorted) {
    object[key] = values.get(key);
  }
};

const pathExists = (root: unknown, path: Path): boolean => {
  let current = root;
  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current) || segment < 0 || segment >= current.length) return false;
      current = current[segment];
      continue;
    }
    if (!isRecord(current) || !hasOwn(current, segment)) return false;
    current = current[segment];
  }
  return true;
};

const findGroup = (entry: ArenaEntry, label: string | undefined, key?: string): PendingGroup | undefined => {
  return entry.pending.find(group => {
    if (label !== undefined && group.label !== label) return false;
    return key === undefined || group.remaining.has(key);
  });
};

const findHeld = (groups: readonly PendingGroup[], id: string): PendingGroup | undefined => {
  for (const group of groups) {
    if (group.id === id) return group;
    const nested = findHeld(group.held, id);
    if (nested) return nested;
  }
  return undefined;
};

/** resolve a grafted group: the deferrals nested in it are owed from now on */
const dropGroup = (entry: ArenaEntry, group: PendingGroup): void => {
  const at = entry.pending.indexOf(group);
  if (at >= 0) entry.pending.splice(at, 1);
  for (const nested of group.held) entry.pending.push(nested);
  group.held = [];
};

/* ────────────────────────────────────────────────────────────────────────── */
/* Public: createIncrementalMerger(tree, payload, options)                   */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Decode a base payload and graft deferred patches onto it as they arrive.
 *
 * A patch addresses either the object that owns a pending deferral (its data
 * is the deferred fields as an object) or one pending deferred field (its data
 * is that field's value). A deferral nested in another one on the same object
 * becomes pending once that one is grafted; deferrals found in grafted data
 * become pending with it.
 */
export const createIncrementalMerger = (
  tree: CanonicalTree,
  payload: unknown,
  options: CodecOptions = {},
) => {
  const variables = resolveVariables(tree, options.variables);
  const base = decodeResponse(tree, payload, { ...options, variables });

  const data = base.data;
  const errors: FieldTreeError[] = base.errors.slice();
  const arena = createArena();

  const register = (deferred: readonly PendingDeferral[]): void => {
    const nested: [ArenaEntry, PendingDeferral, PendingGroup][] = [];

    for (const pending of deferred) {
      const entry = arena.track(pending.object, pending.path);
      const group: PendingGroup = {
        id: pending.id,
        label: pending.label,
        remaining: new Map(pending.fields.map(field => [field.responseKey, field])),
        held: [],
        selectionIndex: pending.selectionIndex,
      };
      if (pending.parent === undefined) entry.pending.push(group);
      else nested.push([entry, pending, group]);
    }

    // a parent may itself be nested and listed after its children
    let rest = nested;
    while (rest.length > 0) {
      const next: typeof nested = [];
      for (const item of rest) {
        const [entry, pending, group] = item;
        const parent = pending.parent === undefined ? undefined : findHeld(entry.pending, pending.parent);
        if (parent) parent.held.push(group);
        else next.push(item);
      }
      if (next.length === rest.length) {
        for (const [entry, , group] of next) entry.pending.push(group);
        break;
      }
      rest = next;
    }
  };

  if (data) arena.index(data, []);
  register(base.deferred);

  let state: MergerState = base.deferred.length > 0 ? "pending" : "complete";

  const newContext = (): DecodeContext => createDecodeContext(tree, variables, options.scalars);

  /** settle a successful decode: keep its errors and track what it brought */
  const settle = (ctx: DecodeContext, value: unknown, path: Path): void => {
    for (const error of ctx.errors) errors.push(error);
    arena.index(value, path);
    register(ctx.deferred);
  };

  const graftGroup = (entry: ArenaEntry, group: PendingGroup, patchData: unknown, path: Path): void => {
    if (!isRecord(patchData)) {
      throw new UnexpectedValueError(path, "an object");
    }

    const fields = Array.from(group.remaining.values(), undeferred);
    const { selectionMap, selectionIndex } = indexByResponseKey(fields);
    const ctx = newContext();
    const decoded = decodeSelection({ selectionSet: fields, selectionMap, selectionIndex }, patchData, path, ctx);

    for (const key of Object.keys(decoded)) {
      entry.object[key] = decoded[key];
    }
    reorder(entry.object, group.selectionIndex);
    dropGroup(entry, group);

    settle(ctx, entry.object, path);
  };

  const graftField = (entry: ArenaEntry, group: PendingGroup, field: Field, patchData: unknown, path: Path): void => {
    const ctx = newContext();
    const value = decodeField(undeferred(field), patchData, path, ctx);

    const key = field.responseKey;
    entry.object[key] = value;
    reorder(entry.object, group.selectionIndex);
    group.remaining.delete(key);
    if (group.remaining.size === 0) dropGroup(entry, group);

    settle(ctx, value, path);
  };

  const pendingLabels = (): string[] => {
    const labels = new Set<string>();
    for (const group of arena.pendingGroups()) labels.add(group.label ?? group.id);
    return Array.from(labels);
  };

  const finish = (isFinal: boolean | undefined): void => {
    if (!isFinal) return;

    const pending = pendingLabels();
    if (pending.length === 0) {
      state = "complete";
      return;
    }

    state = "incomplete";
    throw new IncompleteDeliveryError(pending);
  };

  /**
   * Apply one patch. Errors abort only this patch: nothing is grafted and the
   * pending deferral stays in place.
   */
  const apply = (patch: IncrementalPatch): void => {
    const path = patch.path;

    const owner = arena.lookup(path);
    const ownGroup = owner ? findGroup(owner, patch.label) : undefined;

    if (owner && ownGroup) {
      graftGroup(owner, ownGroup, patch.data, path);
      finish(patch.isFinal);
      return;
    }

    const last = path[path.length - 1];
    const parent = typeof last === "string" ? arena.lookup(path.slice(0, -1)) : undefined;
    const fieldGroup = parent && typeof last === "string" ? findGroup(parent, patch.label, last) : undefined;

    const field = fieldGroup && typeof last === "string" ? fieldGroup.remaining.get(last) : undefined;

    if (parent && fieldGroup && field) {
      graftField(parent, fieldGroup, field, patch.data, path);
      finish(patch.isFinal);
      return;
    }

    if (pathExists(data, path)) {
      throw new DuplicatePatchError(path, patch.label);
    }
    throw new UnresolvablePatchPathError(path);
  };

  /**
   * Apply patches from an ordered source, one at a time, until the final one.
   * Aborting `signal` stops consumption; the current result stays readable.
   */
  const consume = async (source: AsyncIterable<IncrementalPatch>, { signal }: ConsumeOptions = {}): Promise<void> => {
    for await (const patch of source) {
      if (signal?.aborted) break;
      apply(patch);
      if (patch.isFinal) return;
    }

    if (signal?.aborted && state === "pending") {
      devWarn(`incremental delivery abandoned while pending: ${pendingLabels().join(", ")}`);
    }
  };

  return {
    apply,
    consume,
    pendingLabels,

    isComplete: (): boolean => state === "complete",

    currentResult: (): Record<string, unknown> | null => data,

    get state(): MergerState {
      return state;
    },

    get errors(): readonly FieldTreeError[] {
      return errors;
    },
  };
};
