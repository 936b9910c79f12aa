import { describe, expect, it, vi } from "vitest";
import { FixedRiskProvider } from "../src/adapters/inmemory/risk-provider.js";
import { DEFAULT_RISK_SCORE, RiskScorer } from "../src/application/risk-scorer.js";
import { AppError } from "../src/infra/app-error.js";
import type { RiskPrediction, RiskPredictionOptions, RiskProviderPort } from "../src/ports/risk-provider.js";
import { silentLogger } from "./helpers.js";

function providerReturning(prediction: Promise<RiskPrediction>): RiskProviderPort {
  return { modelVersion: "test-v1", predictRisk: () => prediction };
}

describe("RiskScorer", () => {
  it("passes a valid prediction through", async () => {
    const scorer = new RiskScorer(new FixedRiskProvider({ score: 0.42 }), { timeoutMs: 100, logger: silentLogger() });

    await expect(scorer.score({})).resolves.toEqual({ score: 0.42, modelVersion: "fixed-v1", fallback: false });
  });

  it("accepts the bounds of the score range", async () => {
    const logger = silentLogger();
    const low = new RiskScorer(providerReturning(Promise.resolve({ score: 0, modelVersion: "m" })), { timeoutMs: 100, logger });
    const high = new RiskScorer(providerReturning(Promise.resolve({ score: 1, modelVersion: "m" })), { timeoutMs: 100, logger });

    expect((await low.score({})).fallback).toBe(false);
    expect((await high.score({})).score).toBe(1);
  });

  it("falls back after the timeout and aborts the provider call", async () => {
    let receivedSignal: AbortSignal | undefined;
    const provider: RiskProviderPort = {
      modelVersion: "slow-v1",
      predictRisk: (_features, options: RiskPredictionOptions = {}) => {
        receivedSignal = options.signal;
        return new Promise<RiskPrediction>(() => undefined);
      },
    };
    const scorer = new RiskScorer(provider, { timeoutMs: 20, logger: silentLogger() });

    const result = await scorer.score({ cart_total: 100 });

    expect(result).toEqual({
      score: DEFAULT_RISK_SCORE,
      modelVersion: "fallback",
      fallback: true,
      fallbackReason: "timeout",
    });
    expect(receivedSignal?.aborted).toBe(true);
  });

  it("falls back when the provider rejects and logs a warning", async () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    const scorer = new RiskScorer(providerReturning(Promise.reject(new Error("socket hang up"))), {
      timeoutMs: 100,
      logger,
    });

    const result = await scorer.score({});

    expect(result.fallbackReason).toBe("provider_error");
    expect(result.score).toBe(0.15);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe("Risk provider unavailable; using default risk score");
  });

  it.each([1.5, -0.1, Number.NaN, Number.POSITIVE_INFINITY])("treats a score of %s as malformed", async (score) => {
    const scorer = new RiskScorer(providerReturning(Promise.resolve({ score, modelVersion: "m" })), {
      timeoutMs: 100,
      logger: silentLogger(),
    });

    await expect(scorer.score({})).resolves.toEqual({
      score: 0.15,
      modelVersion: "fallback",
      fallback: true,
      fallbackReason: "malformed_score",
    });
  });

  it("classifies malformed provider responses", async () => {
    const failure = new AppError(502, "risk_provider_malformed_response", "bad body");
    const scorer = new RiskScorer(providerReturning(Promise.reject(failure)), { timeoutMs: 100, logger: silentLogger() });

    expect((await scorer.score({})).fallbackReason).toBe("malformed_score");
  });

  it("classifies other provider errors as provider errors", async () => {
    const failure = new AppError(502, "risk_provider_unavailable", "status 503");
    const scorer = new RiskScorer(providerReturning(Promise.reject(failure)), { timeoutMs: 100, logger: silentLogger() });

    expect((await scorer.score({})).fallbackReason).toBe("provider_error");
  });
});
