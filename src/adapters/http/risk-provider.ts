import type { FeatureMap } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { RiskPrediction, RiskPredictionOptions, RiskProviderPort } from "../../ports/risk-provider.js";

interface HttpRiskProviderOptions {
  url: string;
  modelVersion?: string;
  fetchImpl?: typeof fetch;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function malformedResponse(message: string): AppError {
  return new AppError(502, "risk_provider_malformed_response", message);
}

async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw malformedResponse("Risk provider response is not valid JSON.");
  }
}

/**
 * Calls a model-serving endpoint with `{ "features": {...} }` and expects
 * `{ "risk_score": number, "model_version"?: string }` back.
 */
export class HttpRiskProvider implements RiskProviderPort {
  readonly modelVersion: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpRiskProviderOptions) {
    this.modelVersion = options.modelVersion ?? "remote";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async predictRisk(features: FeatureMap, options: RiskPredictionOptions = {}): Promise<RiskPrediction> {
    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ features }),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    if (!response.ok) {
      throw new AppError(
        502,
        "risk_provider_unavailable",
        `Risk provider responded with status ${response.status}.`,
      );
    }

    const body = await readJsonBody(response);
    if (!isObject(body) || typeof body.risk_score !== "number") {
      throw malformedResponse("Risk provider response must contain a numeric risk_score.");
    }

    return {
      score: body.risk_score,
      modelVersion:
        typeof body.model_version === "string" && body.model_version.length > 0
          ? body.model_version
          : this.modelVersion,
    };
  }
}
