import { createHash } from "node:crypto";
import type { FeatureMap } from "../../domain/types.js";
import { formatDecimal, readFeature } from "../../domain/request-fields.js";
import type { RiskPrediction, RiskProviderPort } from "../../ports/risk-provider.js";

function bandScore(value: number, bands: ReadonlyArray<readonly [number, number]>): number {
  for (const [threshold, score] of bands) {
    if (value > threshold) {
      return score;
    }
  }
  return 0;
}

// Stable jitter in [0, 0.099] derived from the feature values.
function hashFactor(key: string): number {
  const digest = createHash("md5").update(key).digest("hex");
  return (Number.parseInt(digest.slice(0, 8), 16) % 100) / 1000;
}

/**
 * Deterministic stand-in for the trained model, used in development and
 * tests. Scores are banded on a handful of features and rounded to 3 places.
 */
export class StubRiskModel implements RiskProviderPort {
  readonly modelVersion = "stub-0.1";

  async predictRisk(features: FeatureMap): Promise<RiskPrediction> {
    if (features.risk_score !== undefined) {
      return { score: readFeature(features, "risk_score"), modelVersion: this.modelVersion };
    }

    const cartTotal = readFeature(features, "cart_total");
    const itemCount = readFeature(features, "item_count", 1);
    const velocity = readFeature(features, "velocity_24h");
    const locationMismatch = readFeature(features, "location_mismatch");

    let score = 0.1;
    score += bandScore(cartTotal, [[1000, 0.3], [500, 0.2], [100, 0.1]]);
    score += bandScore(itemCount, [[10, 0.2], [5, 0.1]]);
    score += bandScore(velocity, [[5, 0.3], [2, 0.2], [1, 0.1]]);
    score += locationMismatch > 0 ? 0.2 : 0;

    const key = [cartTotal, itemCount, velocity, locationMismatch].map(formatDecimal).join("_");
    const capped = Math.min(score + hashFactor(key), 1);
    return { score: Math.round(capped * 1000) / 1000, modelVersion: this.modelVersion };
  }
}
