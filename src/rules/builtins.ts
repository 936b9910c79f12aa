import type { DecisionRequest, RuleResult } from "../domain/types.js";
import {
  formatAmount,
  formatDecimal,
  readContextNumber,
  readContextString,
  readFeature,
} from "../domain/request-fields.js";
import { EMPTY_RULE_RESULT, ruleResult, reviewResult, type Rule } from "./rule.js";

const ROUTE_TO_REVIEW = "ROUTE_TO_REVIEW";
const PREMIUM_LOYALTY_TIERS: ReadonlySet<string> = new Set(["GOLD", "PLATINUM"]);

interface ThresholdRuleOptions {
  threshold: number;
}

export class HighTicketRule implements Rule {
  readonly name = "HIGH_TICKET";

  constructor(private readonly options: ThresholdRuleOptions = { threshold: 500 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.cart_total <= this.options.threshold) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult(
      `HIGH_TICKET: Cart total ${formatAmount(request.cart_total)} exceeds ${formatAmount(this.options.threshold)} threshold`,
      ROUTE_TO_REVIEW,
    );
  }
}

export class VelocityRule implements Rule {
  readonly name = "VELOCITY";

  constructor(private readonly options: ThresholdRuleOptions = { threshold: 3 }) {}

  apply(request: DecisionRequest): RuleResult {
    const velocity = readFeature(request.features, "velocity_24h");
    if (velocity <= this.options.threshold) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult(
      `VELOCITY_FLAG: 24h velocity ${formatDecimal(velocity)} exceeds ${formatDecimal(this.options.threshold)} threshold`,
      ROUTE_TO_REVIEW,
    );
  }
}

export class LocationMismatchRule implements Rule {
  readonly name = "LOCATION_MISMATCH";

  apply(request: DecisionRequest): RuleResult {
    const ipCountry = readContextString(request.context, ["location_ip_country"]);
    const billingCountry = readContextString(request.context, ["billing_country"]);
    if (!ipCountry || !billingCountry || ipCountry === billingCountry) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult(
      `LOCATION_MISMATCH: IP country '${ipCountry}' differs from billing country '${billingCountry}'`,
      ROUTE_TO_REVIEW,
    );
  }
}

export class HighIpDistanceRule implements Rule {
  readonly name = "HIGH_IP_DISTANCE";

  apply(request: DecisionRequest): RuleResult {
    if (readFeature(request.features, "high_ip_distance") === 0) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult(
      "HIGH_IP_DISTANCE: Transaction originates from high-risk IP distance",
      ROUTE_TO_REVIEW,
    );
  }
}

export class ChargebackHistoryRule implements Rule {
  readonly name = "CHARGEBACK_HISTORY";

  apply(request: DecisionRequest): RuleResult {
    const chargebacks = readContextNumber(request.context, ["customer", "chargebacks_12m"]) ?? 0;
    if (chargebacks <= 0) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult(
      `CHARGEBACK_HISTORY: Customer has ${chargebacks} chargeback(s) in last 12 months`,
      ROUTE_TO_REVIEW,
    );
  }
}

// Informational only: adds a reason and an action but never moves the status.
export class LoyaltyBoostRule implements Rule {
  readonly name = "LOYALTY_BOOST";

  apply(request: DecisionRequest): RuleResult {
    const tier = readContextString(request.context, ["customer", "loyalty_tier"]);
    if (!tier || !PREMIUM_LOYALTY_TIERS.has(tier)) {
      return EMPTY_RULE_RESULT;
    }
    return ruleResult("NONE", [`LOYALTY_BOOST: Customer has ${tier} loyalty tier`], ["LOYALTY_BOOST"]);
  }
}
