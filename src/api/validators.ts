import type { Channel, DecisionRequest, DecisionRequestInput, Rail } from "../domain/types.js";
import { freezeRequest } from "../domain/request-fields.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

const rails: ReadonlySet<string> = new Set<Rail>(["Card", "ACH"]);
const channels: ReadonlySet<string> = new Set<Channel>(["online", "pos"]);
const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;

export const DEFAULT_CURRENCY = "USD";

export function assertDecisionRequestInput(payload: unknown): asserts payload is DecisionRequestInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const { cart_total, currency, rail, channel, features, context } = payload;

  if (cart_total === undefined) {
    throw new AppError(422, "invalid_cart_total", "cart_total is required.");
  }
  if (typeof cart_total !== "number" || !Number.isFinite(cart_total) || cart_total <= 0) {
    throw new AppError(422, "invalid_cart_total", "cart_total must be a number greater than zero.");
  }
  if (currency !== undefined && (typeof currency !== "string" || !CURRENCY_PATTERN.test(currency))) {
    throw new AppError(422, "invalid_currency", "currency must be a 3-letter ISO 4217 code.");
  }
  if (typeof rail !== "string" || !rails.has(rail)) {
    throw new AppError(422, "invalid_rail", "rail is required and must be one of: Card, ACH.");
  }
  if (typeof channel !== "string" || !channels.has(channel)) {
    throw new AppError(422, "invalid_channel", "channel is required and must be one of: online, pos.");
  }
  if (features !== undefined) {
    if (!isObject(features)) {
      throw new AppError(422, "invalid_features", "features must be an object mapping names to numbers.");
    }
    for (const [name, value] of Object.entries(features)) {
      const numeric = typeof value === "number" && Number.isFinite(value);
      if (!numeric && typeof value !== "boolean") {
        throw new AppError(422, "invalid_features", `features.${name} must be a finite number or boolean.`);
      }
    }
  }
  if (context !== undefined && !isObject(context)) {
    throw new AppError(422, "invalid_context", "context must be an object.");
  }
}

export function toDecisionRequest(input: DecisionRequestInput): DecisionRequest {
  const features: Record<string, number> = {};
  for (const [name, value] of Object.entries(input.features ?? {})) {
    features[name] = typeof value === "boolean" ? Number(value) : value;
  }

  return freezeRequest({
    cart_total: input.cart_total,
    currency: (input.currency ?? DEFAULT_CURRENCY).toUpperCase(),
    rail: input.rail,
    channel: input.channel,
    features,
    context: structuredClone(input.context ?? {}),
  });
}

/** Validates an untrusted payload and returns a frozen request; extra fields are dropped. */
export function parseDecisionRequest(payload: unknown): DecisionRequest {
  assertDecisionRequestInput(payload);
  return toDecisionRequest(payload);
}
