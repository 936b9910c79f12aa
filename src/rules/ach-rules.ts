import type { DecisionRequest, RuleResult } from "../domain/types.js";
import { isContextFlagSet, readContextString } from "../domain/request-fields.js";
import { EMPTY_RULE_RESULT, declineResult, reviewResult, ruleResult, type Rule } from "./rule.js";

const FALLBACK_CARD = "fallback_card";

interface AchLimitOptions {
  limit: number;
}

interface AchChannelOptions {
  onlineVerificationThreshold: number;
}

export class AchLimitRule implements Rule {
  readonly name = "ACH_LIMIT";

  constructor(private readonly options: AchLimitOptions = { limit: 2000 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "ACH" || request.cart_total <= this.options.limit) {
      return EMPTY_RULE_RESULT;
    }
    return declineResult("ach_limit_exceeded", FALLBACK_CARD);
  }
}

export class AchLocationMismatchRule implements Rule {
  readonly name = "ACH_LOCATION_MISMATCH";

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "ACH") {
      return EMPTY_RULE_RESULT;
    }
    const ipCountry = readContextString(request.context, ["location_ip_country"]);
    const billingCountry = readContextString(request.context, ["billing_country"]);
    const countriesDiffer = Boolean(ipCountry && billingCountry && ipCountry !== billingCountry);
    if (!countriesDiffer && !isContextFlagSet(request.context, ["location_mismatch"])) {
      return EMPTY_RULE_RESULT;
    }
    return declineResult("location_mismatch", FALLBACK_CARD);
  }
}

export class AchChannelRule implements Rule {
  readonly name = "ACH_CHANNEL";

  constructor(private readonly options: AchChannelOptions = { onlineVerificationThreshold: 500 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "ACH") {
      return EMPTY_RULE_RESULT;
    }
    if (request.channel === "pos") {
      return ruleResult("NONE", [], ["ach_pos_processing"]);
    }
    if (request.cart_total <= this.options.onlineVerificationThreshold) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult("ach_online_verification", "micro_deposit_verification");
  }
}
