import { PipelineBus, attachAudit, createLogger } from "@sector-report/pipeline-core";
import { loadConfig } from "@sector-report/config";
import { createCompletionClient, type ClientFactory } from "@sector-report/llm";
import { createMetrics } from "./metrics/registry";
import { runPipeline, type PipelineResult } from "./pipeline";

const log = createLogger("app");

export type AppOptions = {
  createClient?: ClientFactory;
  out?: (line: string) => void;
};

/** Configuration is resolved, and the credential checked, before any client exists. */
export async function runApp(env: Record<string, string | undefined>, options: AppOptions = {}): Promise<PipelineResult> {
  const config = loadConfig(env);
  const createClient = options.createClient ?? createCompletionClient;
  const client = createClient({ provider: config.provider, apiKey: config.apiKey });
  log.info({ provider: config.provider, models: config.models, files: config.files }, "starting sector report");

  const bus = new PipelineBus();
  const detach = attachAudit(bus, log);
  const metrics = createMetrics();
  try {
    return await runPipeline({ config, client, bus, metrics, out: options.out });
  } finally {
    detach();
    log.debug({ metrics: await metrics.registry.getMetricsAsJSON() }, "completion metrics");
  }
}

export { runPipeline, type PipelineDeps, type PipelineResult } from "./pipeline";
export { tallySectors, rankTally, formatTally } from "./metrics/rollups";
export { createMetrics, instrumentClient, type CompletionMetrics } from "./metrics/registry";
