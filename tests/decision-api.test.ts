import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { FixedRiskProvider } from "../src/adapters/inmemory/risk-provider.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { RuleRegistry } from "../src/rules/registry.js";
import { buildApp, type AppDependencies } from "../src/server.js";
import { fixedClock, silentLogger } from "./helpers.js";

const API_KEY = "test-api-key";
const AUTH = { authorization: `Bearer ${API_KEY}` };

function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 0,
    apiKey: API_KEY,
    apiKeys: [API_KEY],
    logLevel: "silent",
    metricsEnabled: true,
    riskProvider: "fixed",
    riskTimeoutMs: 100,
    ...overrides,
  };
}

describe("decision API", () => {
  let app: FastifyInstance | undefined;

  function start(config: RuntimeConfig = testConfig(), dependencies: AppDependencies = {}): FastifyInstance {
    app = buildApp(config, { clock: fixedClock, logger: silentLogger(), ...dependencies });
    return app;
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("serves health checks without credentials", async () => {
    const server = start();

    const live = await server.inject({ method: "GET", url: "/health/live" });
    const ready = await server.inject({ method: "GET", url: "/health/ready" });

    expect(live.statusCode).toBe(200);
    expect(live.json()).toEqual({ status: "ok" });
    expect(ready.json()).toEqual({ status: "ready" });
  });

  it("requires a bearer API key", async () => {
    const server = start();

    const missing = await server.inject({ method: "POST", url: "/v1/decisions", payload: {} });
    const invalid = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: { authorization: "Bearer not-the-key" },
      payload: {},
    });

    expect(missing.statusCode).toBe(401);
    expect(missing.json().error.code).toBe("missing_api_key");
    expect(invalid.statusCode).toBe(401);
    expect(invalid.json().error).toEqual({
      code: "invalid_api_key",
      message: "Invalid API key.",
      request_id: expect.any(String),
    });
  });

  it("returns a decision for a valid request", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 750, rail: "Card", channel: "online", features: { velocity_24h: 4 } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers["x-request-id"]).toEqual(expect.any(String));
    const body = response.json();
    expect(body.status).toBe("REVIEW");
    expect(body.reasons).toEqual([
      "HIGH_TICKET: Cart total $750.00 exceeds $500.00 threshold",
      "VELOCITY_FLAG: 24h velocity 4.0 exceeds 3.0 threshold",
    ]);
    expect(body.actions).toEqual(["ROUTE_TO_REVIEW"]);
    expect(body.meta).toMatchObject({
      timestamp: "2026-03-14T09:30:00.000Z",
      currency: "USD",
      risk_score: 0.15,
      risk_model_version: "fixed-v1",
      risk_fallback: false,
      rules_evaluated: ["HIGH_TICKET", "VELOCITY"],
    });
  });

  it("explains an approval that no rule triggered", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 125.5, rail: "Card", channel: "online" },
    });

    const body = response.json();
    expect(response.statusCode).toBe(200);
    expect(body.status).toBe("APPROVE");
    expect(body.reasons).toEqual(["Cart total $125.50 within approved threshold"]);
    expect(body.actions).toEqual(["Process payment", "Send confirmation"]);
    expect(body.meta.approved_amount).toBe(125.5);
    expect(body.meta.rules_evaluated).toEqual([]);
  });

  it("keeps informational actions ahead of the default approval actions", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 80, rail: "Card", channel: "pos" },
    });

    const body = response.json();
    expect(body.reasons).toEqual(["Cart total $80.00 within approved threshold"]);
    expect(body.actions).toEqual(["pos_processing", "Process payment", "Send confirmation"]);
    expect(body.meta.rules_evaluated).toEqual(["CARD_CHANNEL"]);
  });

  it("leaves explained decisions without an approved amount", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 150, rail: "Card", channel: "online", context: { customer: { loyalty_tier: "GOLD" } } },
    });

    const body = response.json();
    expect(body.reasons).toEqual(["LOYALTY_BOOST: Customer has GOLD loyalty tier"]);
    expect(body.actions).toEqual(["LOYALTY_BOOST"]);
    expect(body.meta).not.toHaveProperty("approved_amount");
  });

  it("rejects invalid requests before evaluating", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 20, rail: "Wire", channel: "online" },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json().error).toMatchObject({
      code: "invalid_rail",
      message: "rail is required and must be one of: Card, ACH.",
    });
  });

  it("rejects a negative cart total", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: -10, rail: "Card", channel: "online" },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json().error.code).toBe("invalid_cart_total");
  });

  it("rejects malformed JSON bodies", async () => {
    const server = start();

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: { ...AUTH, "content-type": "application/json" },
      payload: '{"cart_total": ',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe("invalid_request_body");
  });

  it("declines when the risk score crosses the threshold", async () => {
    const server = start(testConfig(), { riskProvider: new FixedRiskProvider({ score: 0.85 }) });

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 100, rail: "Card", channel: "online" },
    });

    expect(response.json()).toMatchObject({
      status: "DECLINE",
      reasons: ["HIGH_RISK: ML risk score 0.850 exceeds 0.800 threshold"],
      actions: ["BLOCK"],
      meta: { rules_evaluated: ["HIGH_RISK"] },
    });
  });

  it("still decides when the risk provider fails", async () => {
    const server = start(testConfig(), {
      riskProvider: { modelVersion: "broken-v1", predictRisk: () => Promise.reject(new Error("refused")) },
    });

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 100, rail: "Card", channel: "online" },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: "APPROVE",
      meta: { risk_score: 0.15, risk_fallback: true, risk_fallback_reason: "provider_error" },
    });
  });

  it("answers 500 when a rule is defective", async () => {
    const ruleRegistry = new RuleRegistry([
      {
        name: "BROKEN",
        apply: () => {
          throw new Error("lookup table missing");
        },
      },
    ]);
    const server = start(testConfig(), { ruleRegistry });

    const response = await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 100, rail: "Card", channel: "online" },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json().error).toEqual({
      code: "internal_server_error",
      message: "Unexpected error.",
      request_id: expect.any(String),
    });
  });

  it("lists the registered rules in evaluation order", async () => {
    const server = start();

    const response = await server.inject({ method: "GET", url: "/v1/rules", headers: AUTH });

    const body = response.json();
    expect(response.statusCode).toBe(200);
    expect(body.data).toHaveLength(12);
    expect(body.data[0]).toEqual({ name: "HIGH_TICKET", position: 0 });
    expect(body.data[11]).toEqual({ name: "ACH_CHANNEL", position: 11 });
  });

  it("exposes decision counters on the metrics endpoint", async () => {
    const server = start();
    await server.inject({
      method: "POST",
      url: "/v1/decisions",
      headers: AUTH,
      payload: { cart_total: 750, rail: "Card", channel: "online" },
    });

    const response = await server.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/plain; version=0.0.4; charset=utf-8");
    const lines = response.body.split("\n");
    expect(lines).toContain('cde_decisions_total{status="REVIEW"} 1');
    expect(lines).toContain('cde_rule_hits_total{rule="HIGH_TICKET"} 1');
  });

  it("hides the metrics endpoint when metrics are disabled", async () => {
    const server = start(testConfig({ metricsEnabled: false }));

    const response = await server.inject({ method: "GET", url: "/metrics", headers: AUTH });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe("resource_not_found");
  });

  it("answers unknown routes with 404", async () => {
    const server = start();

    const response = await server.inject({ method: "GET", url: "/v1/unknown", headers: AUTH });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: { code: "resource_not_found", message: "Route not found.", request_id: expect.any(String) },
    });
  });
});
