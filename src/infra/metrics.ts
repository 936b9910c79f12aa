import type { DecisionResponse } from "../domain/types.js";
import { HIGH_RISK_RULE_NAME } from "../rules/registry.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function labelKey(labels: LabelSet): string {
  return JSON.stringify(labels);
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  return `{${entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

function header(name: string, help: string, type: "counter" | "histogram"): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

class CounterMetric {
  private readonly series = new Map<string, { labels: LabelSet; value: number }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: LabelSet = {}): void {
    const key = labelKey(labels);
    const entry = this.series.get(key) ?? { labels, value: 0 };
    entry.value += 1;
    this.series.set(key, entry);
  }

  render(): string[] {
    const lines = header(this.name, this.help, "counter");
    for (const { labels, value } of this.series.values()) {
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

interface HistogramSeries {
  labels: LabelSet;
  count: number;
  sum: number;
  bucketCounts: number[];
}

class HistogramMetric {
  private readonly series = new Map<string, HistogramSeries>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly buckets: readonly number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = labelKey(labels);
    const entry = this.series.get(key) ?? {
      labels,
      count: 0,
      sum: 0,
      bucketCounts: this.buckets.map(() => 0),
    };
    entry.count += 1;
    entry.sum += value;
    entry.bucketCounts = entry.bucketCounts.map((count, index) =>
      value <= (this.buckets[index] ?? Number.POSITIVE_INFINITY) ? count + 1 : count,
    );
    this.series.set(key, entry);
  }

  render(): string[] {
    const lines = header(this.name, this.help, "histogram");
    for (const { labels, count, sum, bucketCounts } of this.series.values()) {
      for (const [index, bound] of this.buckets.entries()) {
        lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: String(bound) })} ${bucketCounts[index] ?? 0}`);
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${count}`);
      lines.push(`${this.name}_sum${formatLabels(labels)} ${sum}`);
      lines.push(`${this.name}_count${formatLabels(labels)} ${count}`);
    }
    return lines;
  }
}

export class DecisionMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "cde_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
  );
  private readonly httpDuration = new HistogramMetric(
    "cde_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly decisions = new CounterMetric(
    "cde_decisions_total",
    "Total number of decisions produced by final status.",
  );
  private readonly ruleHits = new CounterMetric(
    "cde_rule_hits_total",
    "Total number of non-empty rule results by rule.",
  );
  private readonly riskOverrides = new CounterMetric(
    "cde_risk_overrides_total",
    "Total number of decisions forced to DECLINE by the risk score.",
  );
  private readonly riskFallbacks = new CounterMetric(
    "cde_risk_fallbacks_total",
    "Total number of evaluations that used the default risk score, by reason.",
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordDecision(decision: DecisionResponse): void {
    this.decisions.inc({ status: decision.status });
    for (const rule of decision.meta.rules_evaluated) {
      if (rule === HIGH_RISK_RULE_NAME) {
        this.riskOverrides.inc();
      } else {
        this.ruleHits.inc({ rule });
      }
    }
    if (decision.meta.risk_fallback_reason) {
      this.riskFallbacks.inc({ reason: decision.meta.risk_fallback_reason });
    }
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.decisions.render(),
      ...this.ruleHits.render(),
      ...this.riskOverrides.render(),
      ...this.riskFallbacks.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
