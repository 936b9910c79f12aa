import { pino, type Logger } from "pino";
import { toDecisionRequest } from "../src/api/validators.js";
import type { DecisionRequest, DecisionRequestInput, RuleResult } from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { Rule } from "../src/rules/rule.js";

export const FIXED_TIMESTAMP = "2026-03-14T09:30:00.000Z";

export const fixedClock: ClockPort = {
  nowIso: () => FIXED_TIMESTAMP,
};

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeRequest(overrides: Partial<DecisionRequestInput> = {}): DecisionRequest {
  return toDecisionRequest({
    cart_total: 100,
    rail: "Card",
    channel: "online",
    ...overrides,
  });
}

export function fixedRule(name: string, result: RuleResult): Rule {
  return { name, apply: () => result };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw.");
}
