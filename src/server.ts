import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { HttpRiskProvider } from "./adapters/http/risk-provider.js";
import { FixedRiskProvider } from "./adapters/inmemory/risk-provider.js";
import { StubRiskModel } from "./adapters/inmemory/stub-risk-model.js";
import { presentDecision } from "./api/decision-presenter.js";
import { parseDecisionRequest } from "./api/validators.js";
import { DecisionEngine, RuleEvaluationError } from "./application/decision-engine.js";
import { RiskScorer } from "./application/risk-scorer.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { DecisionMetricsRegistry } from "./infra/metrics.js";
import type { RiskProviderPort } from "./ports/risk-provider.js";
import { createDefaultRuleRegistry, type RuleRegistry } from "./rules/registry.js";

export interface AppDependencies {
  clock?: ClockPort;
  logger?: Logger;
  riskProvider?: RiskProviderPort;
  ruleRegistry?: RuleRegistry;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function createRiskProvider(config: RuntimeConfig): RiskProviderPort {
  switch (config.riskProvider) {
    case "stub":
      return new StubRiskModel();
    case "http":
      if (!config.riskProviderUrl) {
        throw new AppError(500, "invalid_runtime_config", "HTTP risk provider requested without a URL.");
      }
      return new HttpRiskProvider({ url: config.riskProviderUrl });
    case "fixed":
      return new FixedRiskProvider();
  }
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  dependencies: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = dependencies.logger ?? createLogger(config.logLevel);
  const metrics = new DecisionMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);

  const clock = dependencies.clock ?? new SystemClock();
  const ruleRegistry = dependencies.ruleRegistry ?? createDefaultRuleRegistry();
  const riskScorer = new RiskScorer(dependencies.riskProvider ?? createRiskProvider(config), {
    timeoutMs: config.riskTimeoutMs,
    logger,
  });
  const engine = new DecisionEngine(ruleRegistry, riskScorer, clock, logger);
  const requestStartNs = new WeakMap<FastifyRequest, bigint>();

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartNs.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStartNs.get(request);
    if (startNs === undefined) {
      return;
    }
    const endNs = process.hrtime.bigint();
    const durationSeconds = Number(endNs - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/decisions", async (request, reply) => {
    const decisionRequest = parseDecisionRequest(request.body);
    const decision = await engine.evaluate(decisionRequest);
    if (config.metricsEnabled) {
      metrics.recordDecision(decision);
    }
    return reply.status(200).send(presentDecision(decision));
  });

  app.get("/v1/rules", async (_request, reply) => {
    return reply.status(200).send({
      data: ruleRegistry.names().map((name, position) => ({ name, position })),
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    // Body parser failures (malformed JSON, wrong content type) arrive as Fastify 4xx errors.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(400).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error instanceof RuleEvaluationError) {
      logger.error({ err: error, rule: error.ruleName, request_id: request.id }, "Rule defect aborted evaluation");
    } else {
      logger.error({ err: error, request_id: request.id }, "Unhandled error");
    }
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}
