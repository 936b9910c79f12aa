import type { DecisionRequest, RuleResult } from "../domain/types.js";
import { readFeature } from "../domain/request-fields.js";
import { EMPTY_RULE_RESULT, declineResult, reviewResult, ruleResult, type Rule } from "./rule.js";

interface CardHighTicketOptions {
  limit: number;
}

interface CardVelocityOptions {
  limit: number;
}

interface CardChannelOptions {
  onlineVerificationThreshold: number;
}

export class CardHighTicketRule implements Rule {
  readonly name = "CARD_HIGH_TICKET";

  constructor(private readonly options: CardHighTicketOptions = { limit: 5000 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "Card" || request.cart_total <= this.options.limit) {
      return EMPTY_RULE_RESULT;
    }
    return declineResult("high_ticket", "manual_review");
  }
}

export class CardVelocityRule implements Rule {
  readonly name = "CARD_VELOCITY";

  constructor(private readonly options: CardVelocityOptions = { limit: 4 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "Card") {
      return EMPTY_RULE_RESULT;
    }
    const velocity = readFeature(request.features, "velocity_24h");
    if (velocity <= this.options.limit) {
      return EMPTY_RULE_RESULT;
    }
    return declineResult("velocity_flag", "block_transaction");
  }
}

/** Online card payments above the verification threshold need step-up auth; POS is trusted. */
export class CardChannelRule implements Rule {
  readonly name = "CARD_CHANNEL";

  constructor(private readonly options: CardChannelOptions = { onlineVerificationThreshold: 1000 }) {}

  apply(request: DecisionRequest): RuleResult {
    if (request.rail !== "Card") {
      return EMPTY_RULE_RESULT;
    }
    if (request.channel === "pos") {
      return ruleResult("NONE", [], ["pos_processing"]);
    }
    if (request.cart_total <= this.options.onlineVerificationThreshold) {
      return EMPTY_RULE_RESULT;
    }
    return reviewResult("online_verification", "step_up_auth");
  }
}
