import { formatAmount } from "../domain/request-fields.js";
import type { DecisionResponse } from "../domain/types.js";

export const DEFAULT_APPROVAL_ACTIONS = ["Process payment", "Send confirmation"] as const;

/**
 * Shapes an engine decision for API clients. An approval that no rule
 * explained gets a default reason, the payment follow-up actions and
 * `meta.approved_amount`; every other decision passes through unchanged.
 */
export function presentDecision(decision: DecisionResponse): DecisionResponse {
  if (decision.status !== "APPROVE" || decision.reasons.length > 0) {
    return decision;
  }
  const { cart_total } = decision.meta;
  return {
    ...decision,
    reasons: [`Cart total ${formatAmount(cart_total)} within approved threshold`],
    actions: [...decision.actions, ...DEFAULT_APPROVAL_ACTIONS],
    meta: { ...decision.meta, approved_amount: cart_total },
  };
}
