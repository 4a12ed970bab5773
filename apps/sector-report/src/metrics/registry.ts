import { Counter, Histogram, Registry } from "prom-client";
import type { StageRole } from "@sector-report/pipeline-core";
import type { CompletionClient } from "@sector-report/llm";

export type CompletionMetrics = {
  registry: Registry;
  requests: Counter<"stage" | "outcome">;
  duration: Histogram<"stage">;
};

export function createMetrics(): CompletionMetrics {
  const registry = new Registry();
  const requests = new Counter({
    name: "completion_requests_total",
    help: "Completion requests by pipeline stage and outcome",
    labelNames: ["stage", "outcome"] as const,
    registers: [registry],
  });
  const duration = new Histogram({
    name: "completion_request_duration_seconds",
    help: "Completion request latency by pipeline stage",
    labelNames: ["stage"] as const,
    buckets: [0.25, 0.5, 1, 2, 5, 10, 30],
    registers: [registry],
  });
  return { registry, requests, duration };
}

export function instrumentClient(inner: CompletionClient, metrics: CompletionMetrics, stage: StageRole): CompletionClient {
  return {
    provider: inner.provider,
    async complete(request) {
      const end = metrics.duration.startTimer({ stage });
      try {
        const res = await inner.complete(request);
        metrics.requests.inc({ stage, outcome: "ok" });
        return res;
      } catch (err) {
        metrics.requests.inc({ stage, outcome: "error" });
        throw err;
      } finally {
        end();
      }
    },
  };
}
