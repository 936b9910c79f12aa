import type { DecisionHint, DecisionStatus } from "./types.js";

// DECLINE > REVIEW > APPROVE, independent of the order hints arrive in.
const STATUS_PRIORITY: Record<DecisionStatus, number> = {
  APPROVE: 0,
  REVIEW: 1,
  DECLINE: 2,
};

export function outranks(candidate: DecisionStatus, current: DecisionStatus): boolean {
  return STATUS_PRIORITY[candidate] > STATUS_PRIORITY[current];
}

export function applyHint(current: DecisionStatus, hint: DecisionHint): DecisionStatus {
  if (hint === "NONE") {
    return current;
  }
  return outranks(hint, current) ? hint : current;
}

/** Once a rule has declined, no later rule can change the rule-folding outcome. */
export function isTerminalStatus(status: DecisionStatus): boolean {
  return status === "DECLINE";
}
