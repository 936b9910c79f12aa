import type { DecisionHint, DecisionRequest, RuleResult } from "../domain/types.js";

/**
 * A single unit of checkout policy.
 *
 * `apply` must be a pure function of the request: no I/O, no randomness and no
 * state carried between calls. A rule that does not match returns
 * {@link EMPTY_RULE_RESULT}; throwing is reserved for defects.
 */
export interface Rule {
  readonly name: string;
  apply(request: DecisionRequest): RuleResult;
}

export const EMPTY_RULE_RESULT: RuleResult = ruleResult("NONE", [], []);

export function ruleResult(hint: DecisionHint, reasons: string[], actions: string[]): RuleResult {
  return Object.freeze({
    hint,
    reasons: Object.freeze([...reasons]),
    actions: Object.freeze([...actions]),
  });
}

export function reviewResult(reason: string, action: string): RuleResult {
  return ruleResult("REVIEW", [reason], [action]);
}

export function declineResult(reason: string, action: string): RuleResult {
  return ruleResult("DECLINE", [reason], [action]);
}

export function isEmptyRuleResult(result: RuleResult): boolean {
  return result.hint === "NONE" && result.reasons.length === 0 && result.actions.length === 0;
}
