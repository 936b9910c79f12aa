export type Rail = "Card" | "ACH";

export type Channel = "online" | "pos";

export type DecisionStatus = "APPROVE" | "REVIEW" | "DECLINE";

/** A rule's proposed contribution to the final status. Rules can never propose APPROVE. */
export type DecisionHint = "NONE" | "REVIEW" | "DECLINE";

export type RiskFallbackReason = "timeout" | "provider_error" | "malformed_score";

export type FeatureMap = Readonly<Record<string, number>>;

export type RequestContext = Readonly<Record<string, unknown>>;

export interface DecisionRequest {
  readonly cart_total: number;
  readonly currency: string;
  readonly rail: Rail;
  readonly channel: Channel;
  readonly features: FeatureMap;
  readonly context: RequestContext;
}

export interface RuleResult {
  readonly hint: DecisionHint;
  readonly reasons: readonly string[];
  readonly actions: readonly string[];
}

export interface RiskScore {
  score: number;
  modelVersion: string;
  fallback: boolean;
  fallbackReason?: RiskFallbackReason;
}

export interface DecisionMeta {
  transaction_id: string;
  timestamp: string;
  cart_total: number;
  currency: string;
  rail: Rail;
  channel: Channel;
  risk_score: number;
  risk_model_version: string;
  risk_fallback: boolean;
  risk_fallback_reason?: RiskFallbackReason;
  rules_evaluated: string[];
  approved_amount?: number;
}

export interface DecisionResponse {
  status: DecisionStatus;
  reasons: string[];
  actions: string[];
  meta: DecisionMeta;
}

export interface DecisionRequestInput {
  cart_total: number;
  currency?: string;
  rail: Rail;
  channel: Channel;
  features?: Record<string, number | boolean>;
  context?: Record<string, unknown>;
}
