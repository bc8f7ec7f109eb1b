import {
  Kind,
  type DocumentNode,
  type FieldNode,
  type SelectionNode,
  type SelectionSetNode,
} from "graphql";
import { TYPENAME_FIELD } from "../constants";

const TYPENAME_NODE: FieldNode = { kind: Kind.FIELD, name: { kind: Kind.NAME, value: TYPENAME_FIELD } };

function ensureTypename(ss: SelectionSetNode): SelectionSetNode {
  const has = ss.selections.some(
    s => s.kind === Kind.FIELD && !s.alias && s.name.value === TYPENAME_FIELD,
  );
  if (has) return ss;

  return { kind: ss.kind, selections: ss.selections.concat(TYPENAME_NODE) };
}

/** Rewrite nested selection sets (fields and inline fragments) without touching this level */
function ensureTypenameNested(ss: SelectionSetNode): SelectionSetNode {
  let hasChanges = false;
  const selections = new Array<SelectionNode>(ss.selections.length);

  for (let i = 0; i < ss.selections.length; i++) {
    const sel = ss.selections[i];
    if (sel.kind === Kind.FIELD && sel.selectionSet) {
      const next = ensureTypenameRecursive(sel.selectionSet);
      selections[i] = next === sel.selectionSet ? sel : { ...sel, selectionSet: next };
      hasChanges = hasChanges || next !== sel.selectionSet;
    } else if (sel.kind === Kind.INLINE_FRAGMENT) {
      const next = ensureTypenameNested(sel.selectionSet);
      selections[i] = next === sel.selectionSet ? sel : { ...sel, selectionSet: next };
      hasChanges = hasChanges || next !== sel.selectionSet;
    } else {
      selections[i] = sel;
    }
  }

  return hasChanges ? { kind: ss.kind, selections } : ss;
}

/** Add __typename to this level and every nested composite selection */
function ensureTypenameRecursive(ss: SelectionSetNode): SelectionSetNode {
  return ensureTypename(ensureTypenameNested(ss));
}

/**
 * Add __typename to every selection set except the operation roots;
 * fragment definitions get it at every level, including their own root.
 */
export const addTypenameToDocument = (document: DocumentNode): DocumentNode => {
  const definitions = document.definitions.map(d => {
    if (d.kind === Kind.OPERATION_DEFINITION) {
      const selectionSet = ensureTypenameNested(d.selectionSet);
      return selectionSet === d.selectionSet ? d : { ...d, selectionSet };
    }
    if (d.kind === Kind.FRAGMENT_DEFINITION) {
      const selectionSet = ensureTypenameRecursive(d.selectionSet);
      return selectionSet === d.selectionSet ? d : { ...d, selectionSet };
    }
    return d;
  });

  return { kind: document.kind, definitions };
};
