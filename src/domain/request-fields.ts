import type { DecisionRequest, FeatureMap, RequestContext } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function readFeature(features: FeatureMap, key: string, fallback = 0): number {
  const value = features[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function readContextValue(context: RequestContext, path: readonly string[]): unknown {
  let current: unknown = context;
  for (const key of path) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function readContextString(context: RequestContext, path: readonly string[]): string | undefined {
  const value = readContextValue(context, path);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function readContextNumber(context: RequestContext, path: readonly string[]): number | undefined {
  const value = readContextValue(context, path);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function isContextFlagSet(context: RequestContext, path: readonly string[]): boolean {
  const value = readContextValue(context, path);
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  return typeof value === "string" && value.length > 0;
}

/**
 * Fixed-point rendering that rounds exact ties half-to-even, so `500.625`
 * becomes `500.62` where `toFixed` would give `500.63`.
 */
export function formatFixed(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded;
  }
  // toFixed(100) is the exact binary value for anything large enough to tie.
  const expanded = value.toFixed(100);
  const cut = expanded.indexOf(".") + (digits > 0 ? digits + 1 : 0);
  if (!/^50*$/.test(expanded.slice(cut + (digits > 0 ? 0 : 1)))) {
    return rounded;
  }
  const truncated = expanded.slice(0, cut);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/**
 * Shortest round-trip rendering that always shows a fraction for whole
 * numbers (`4` -> `4.0`) and switches to exponent form at 1e16 and below 1e-4
 * (`1e+21`, `1e-05`).
 */
export function formatDecimal(value: number): string {
  const magnitude = Math.abs(value);
  if (Number.isFinite(value) && value !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
    return value
      .toExponential()
      .replace(/e([+-])(\d)$/, (_match: string, sign: string, exponent: string) => `e${sign}0${exponent}`);
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatAmount(value: number): string {
  return `$${formatFixed(value, 2)}`;
}

function deepFreeze<TValue>(value: TValue): TValue {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}

export function freezeRequest(request: DecisionRequest): DecisionRequest {
  return deepFreeze(request);
}
