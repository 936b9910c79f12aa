import type { Logger } from "pino";
import type { FeatureMap, RiskFallbackReason, RiskScore } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { RiskProviderPort } from "../ports/risk-provider.js";

export const DEFAULT_RISK_SCORE = 0.15;
export const FALLBACK_MODEL_VERSION = "fallback";

interface RiskScorerOptions {
  timeoutMs: number;
  logger: Logger;
}

class RiskTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Risk provider did not answer within ${timeoutMs}ms.`);
    this.name = "RiskTimeoutError";
  }
}

function isValidScore(score: number): boolean {
  return Number.isFinite(score) && score >= 0 && score <= 1;
}

function classifyFailure(error: unknown): RiskFallbackReason {
  if (error instanceof RiskTimeoutError) {
    return "timeout";
  }
  if (error instanceof AppError && error.code === "risk_provider_malformed_response") {
    return "malformed_score";
  }
  return "provider_error";
}

/**
 * Bounds the risk provider call and never lets it fail an evaluation: on
 * timeout, error or an out-of-range score the default score is used and the
 * result is flagged as a fallback.
 */
export class RiskScorer {
  constructor(
    private readonly provider: RiskProviderPort,
    private readonly options: RiskScorerOptions,
  ) {}

  async score(features: FeatureMap): Promise<RiskScore> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new RiskTimeoutError(this.options.timeoutMs));
      }, this.options.timeoutMs);
    });

    try {
      const prediction = await Promise.race([
        this.provider.predictRisk(features, { signal: controller.signal }),
        timeout,
      ]);
      if (!isValidScore(prediction.score)) {
        return this.fallback("malformed_score", { score: prediction.score });
      }
      return {
        score: prediction.score,
        modelVersion: prediction.modelVersion,
        fallback: false,
      };
    } catch (error) {
      return this.fallback(classifyFailure(error), { err: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private fallback(reason: RiskFallbackReason, details: Record<string, unknown>): RiskScore {
    this.options.logger.warn(
      { ...details, reason, provider_model_version: this.provider.modelVersion },
      "Risk provider unavailable; using default risk score",
    );
    return {
      score: DEFAULT_RISK_SCORE,
      modelVersion: FALLBACK_MODEL_VERSION,
      fallback: true,
      fallbackReason: reason,
    };
  }
}
