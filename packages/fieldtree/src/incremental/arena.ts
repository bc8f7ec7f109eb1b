import { isRecord } from "../codec/dispatch";
import type { Path } from "../core/errors";
import type { Field } from "../compiler/types";

/** One deferral still owed to an object: the fields a patch must bring. */
export type PendingGroup = {
  id: string;
  label?: string;
  remaining: Map<string, Field>;
  /** deferrals nested in this one; they become pending when this one is grafted */
  held: PendingGroup[];
  /** canonical positions of the owning object's selection */
  selectionIndex: ReadonlyMap<string, number>;
};

export type ArenaEntry = {
  object: Record<string, unknown>;
  path: Path;
  pending: PendingGroup[];
};

export type Arena = ReturnType<typeof createArena>;

const pathKey = (path: Path): string => JSON.stringify(path);

/**
 * Result objects of one response, addressed by index, with a path index
 * so patch paths resolve without walking the tree.
 */
export const createArena = () => {
  const entries: ArenaEntry[] = [];
  const byPath = new Map<string, number>();

  const track = (object: Record<string, unknown>, path: Path): ArenaEntry => {
    const key = pathKey(path);
    const index = byPath.get(key);
    if (index !== undefined && entries[index].object === object) {
      return entries[index];
    }

    const entry: ArenaEntry = { object, path, pending: [] };
    byPath.set(key, entries.length);
    entries.push(entry);
    return entry;
  };

  /** register every object of a decoded subtree rooted at `path` */
  const index = (value: unknown, path: Path): void => {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) index(value[i], path.concat(i));
      return;
    }
    if (!isRecord(value)) return;

    track(value, path);
    for (const key of Object.keys(value)) {
      index(value[key], path.concat(key));
    }
  };

  const lookup = (path: Path): ArenaEntry | undefined => {
    const at = byPath.get(pathKey(path));
    return at === undefined ? undefined : entries[at];
  };

  const pendingGroups = (): PendingGroup[] => {
    const out: PendingGroup[] = [];
    for (const entry of entries) {
      for (const group of entry.pending) out.push(group);
    }
    return out;
  };

  return { track, index, lookup, pendingGroups };
};
