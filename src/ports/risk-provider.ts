import type { FeatureMap } from "../domain/types.js";

export interface RiskPrediction {
  score: number;
  modelVersion: string;
}

export interface RiskPredictionOptions {
  signal?: AbortSignal;
}

/**
 * Source of the ML risk score for a request's feature set.
 *
 * Implementations may be slow or fail; callers go through the risk scorer,
 * which bounds the call and substitutes the default score.
 */
export interface RiskProviderPort {
  readonly modelVersion: string;
  predictRisk(features: FeatureMap, options?: RiskPredictionOptions): Promise<RiskPrediction>;
}
