import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { formatFixed } from "../domain/request-fields.js";
import { applyHint, isTerminalStatus } from "../domain/state-machine.js";
import type {
  DecisionRequest,
  DecisionResponse,
  DecisionStatus,
  RiskScore,
  RuleResult,
} from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import { isEmptyRuleResult, type Rule } from "../rules/rule.js";
import { HIGH_RISK_RULE_NAME, type RuleRegistry } from "../rules/registry.js";
import type { RiskScorer } from "./risk-scorer.js";

export const HIGH_RISK_THRESHOLD = 0.8;
export const HIGH_RISK_ACTION = "BLOCK";

export interface RuleFoldOutcome {
  status: DecisionStatus;
  reasons: string[];
  actions: string[];
  rulesEvaluated: string[];
}

/** A rule threw instead of returning a result. Never rendered as a business decision. */
export class RuleEvaluationError extends Error {
  constructor(
    public readonly ruleName: string,
    cause: unknown,
  ) {
    super(`Rule '${ruleName}' failed during evaluation.`, { cause });
    this.name = "RuleEvaluationError";
  }
}

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function applyRule(rule: Rule, request: DecisionRequest): RuleResult {
  try {
    return rule.apply(request);
  } catch (error) {
    throw new RuleEvaluationError(rule.name, error);
  }
}

/**
 * Phase 1: runs the rules in registry order and folds their results.
 * A DECLINE hint ends the pass; reasons and actions are deduplicated with the
 * first occurrence kept.
 */
export function foldRules(rules: readonly Rule[], request: DecisionRequest): RuleFoldOutcome {
  let status: DecisionStatus = "APPROVE";
  const reasons: string[] = [];
  const actions: string[] = [];
  const rulesEvaluated: string[] = [];

  for (const rule of rules) {
    const result = applyRule(rule, request);
    if (isEmptyRuleResult(result)) {
      continue;
    }
    rulesEvaluated.push(rule.name);
    reasons.push(...result.reasons);
    actions.push(...result.actions);
    status = applyHint(status, result.hint);
    if (isTerminalStatus(status)) {
      break;
    }
  }

  return {
    status,
    reasons: uniqueInOrder(reasons),
    actions: uniqueInOrder(actions),
    rulesEvaluated,
  };
}

/** Phase 2: a score above the threshold forces DECLINE whatever the rules decided. */
export function applyRiskOverride(outcome: RuleFoldOutcome, risk: RiskScore): RuleFoldOutcome {
  if (risk.score <= HIGH_RISK_THRESHOLD) {
    return outcome;
  }
  return {
    status: "DECLINE",
    reasons: [
      ...outcome.reasons,
      `HIGH_RISK: ML risk score ${formatFixed(risk.score, 3)} exceeds ${formatFixed(HIGH_RISK_THRESHOLD, 3)} threshold`,
    ],
    actions: outcome.actions.includes(HIGH_RISK_ACTION)
      ? [...outcome.actions]
      : [...outcome.actions, HIGH_RISK_ACTION],
    rulesEvaluated: [...outcome.rulesEvaluated, HIGH_RISK_RULE_NAME],
  };
}

export class DecisionEngine {
  constructor(
    private readonly registry: RuleRegistry,
    private readonly riskScorer: RiskScorer,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async evaluate(request: DecisionRequest): Promise<DecisionResponse> {
    const folded = foldRules(this.registry.rules(), request);
    const risk = await this.riskScorer.score(request.features);
    const outcome = applyRiskOverride(folded, risk);

    const response: DecisionResponse = {
      status: outcome.status,
      reasons: outcome.reasons,
      actions: outcome.actions,
      meta: {
        transaction_id: `txn_${randomUUID()}`,
        timestamp: this.clock.nowIso(),
        cart_total: request.cart_total,
        currency: request.currency,
        rail: request.rail,
        channel: request.channel,
        risk_score: risk.score,
        risk_model_version: risk.modelVersion,
        risk_fallback: risk.fallback,
        rules_evaluated: outcome.rulesEvaluated,
        ...(risk.fallbackReason ? { risk_fallback_reason: risk.fallbackReason } : {}),
      },
    };

    this.logger.debug(
      {
        transaction_id: response.meta.transaction_id,
        status: response.status,
        rules_evaluated: response.meta.rules_evaluated,
        risk_score: risk.score,
      },
      "Decision evaluated",
    );
    return response;
  }
}
