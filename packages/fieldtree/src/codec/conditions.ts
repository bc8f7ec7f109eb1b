import { evaluateValueNode } from "../compiler/lowering/args";
import type { Conditions, Deferral } from "../compiler/types";

export type Variables = Readonly<Record<string, unknown>>;

/**
 * Evaluate static @include / @skip annotations against resolved variables.
 * `[]` is unconditional; otherwise any satisfied conjunction includes the field.
 */
export const isIncluded = (conditions: Conditions, variables: Variables): boolean => {
  if (conditions.length === 0) return true;

  for (const conjunction of conditions) {
    let ok = true;
    for (const condition of conjunction) {
      const value = evaluateValueNode(condition.if, variables) === true;
      if (condition.kind === "include" ? !value : value) {
        ok = false;
        break;
      }
    }
    if (ok) return true;
  }

  return false;
};

/** a deferral with a variable-bound `if` is active unless the variable is false */
export const isDeferred = (deferral: Deferral | undefined, variables: Variables): deferral is Deferral => {
  if (!deferral) return false;
  if (!deferral.if) return true;
  return evaluateValueNode(deferral.if, variables) !== false;
};
