import { AppError } from "../infra/app-error.js";
import { AchChannelRule, AchLimitRule, AchLocationMismatchRule } from "./ach-rules.js";
import {
  ChargebackHistoryRule,
  HighIpDistanceRule,
  HighTicketRule,
  LocationMismatchRule,
  LoyaltyBoostRule,
  VelocityRule,
} from "./builtins.js";
import { CardChannelRule, CardHighTicketRule, CardVelocityRule } from "./card-rules.js";
import type { Rule } from "./rule.js";

/** Identifier the risk override appends to `rules_evaluated`; no registered rule may use it. */
export const HIGH_RISK_RULE_NAME = "HIGH_RISK";

/**
 * Immutable, ordered rule set.
 *
 * Order decides how reasons and actions are appended (and so deduplicated) and
 * the order of `rules_evaluated`. It never decides which status wins. Append
 * new rules at the end; reordering changes response ordering.
 */
export class RuleRegistry {
  private readonly ordered: readonly Rule[];

  constructor(rules: readonly Rule[]) {
    const seen = new Set<string>();
    for (const rule of rules) {
      if (rule.name === HIGH_RISK_RULE_NAME) {
        throw new AppError(
          500,
          "invalid_rule_registry",
          `Rule name '${HIGH_RISK_RULE_NAME}' is reserved for the risk override.`,
        );
      }
      if (seen.has(rule.name)) {
        throw new AppError(500, "invalid_rule_registry", `Rule '${rule.name}' is registered more than once.`);
      }
      seen.add(rule.name);
    }
    this.ordered = Object.freeze([...rules]);
  }

  rules(): readonly Rule[] {
    return this.ordered;
  }

  names(): string[] {
    return this.ordered.map((rule) => rule.name);
  }
}

export function defaultRules(): Rule[] {
  return [
    new HighTicketRule({ threshold: 500 }),
    new VelocityRule({ threshold: 3 }),
    new LocationMismatchRule(),
    new HighIpDistanceRule(),
    new ChargebackHistoryRule(),
    new LoyaltyBoostRule(),
    new CardHighTicketRule({ limit: 5000 }),
    new CardVelocityRule({ limit: 4 }),
    new CardChannelRule({ onlineVerificationThreshold: 1000 }),
    new AchLimitRule({ limit: 2000 }),
    new AchLocationMismatchRule(),
    new AchChannelRule({ onlineVerificationThreshold: 500 }),
  ];
}

export function createDefaultRuleRegistry(): RuleRegistry {
  return new RuleRegistry(defaultRules());
}
