import type { FeatureMap } from "../../domain/types.js";
import { readFeature } from "../../domain/request-fields.js";
import type { RiskPrediction, RiskProviderPort } from "../../ports/risk-provider.js";

interface FixedRiskProviderOptions {
  score: number;
}

/** Returns a constant score unless the request carries a `risk_score` feature. */
export class FixedRiskProvider implements RiskProviderPort {
  readonly modelVersion = "fixed-v1";

  constructor(private readonly options: FixedRiskProviderOptions = { score: 0.15 }) {}

  async predictRisk(features: FeatureMap): Promise<RiskPrediction> {
    return {
      score: readFeature(features, "risk_score", this.options.score),
      modelVersion: this.modelVersion,
    };
  }
}
