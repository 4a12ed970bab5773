import type { ConstituentTable, PipelineBus } from "@sector-report/pipeline-core";
import { createLogger } from "@sector-report/pipeline-core";
import type { SectorTally } from "@sector-report/schemas";
import type { AppConfig } from "@sector-report/config";
import type { CompletionClient } from "@sector-report/llm";
import { joinConstituents, loadDatasets } from "@sector-report/datasets";
import { SectorAgent, type ClassificationReport } from "@sector-report/sector-agent";
import { RecommendationAgent } from "@sector-report/recommendation-agent";
import { formatTally, tallySectors } from "./metrics/rollups";
import { instrumentClient, type CompletionMetrics } from "./metrics/registry";

const log = createLogger("pipeline");

export type PipelineDeps = {
  config: AppConfig;
  client: CompletionClient;
  bus?: PipelineBus | null;
  metrics?: CompletionMetrics;
  out?: (line: string) => void;
};

export type PipelineResult = {
  table: ConstituentTable;
  classification: ClassificationReport;
  tally: SectorTally;
  recommendation: string;
};

// load -> join -> classify -> tally -> recommend; every step awaits the previous one
export async function runPipeline({ config, client, bus = null, metrics, out = console.log }: PipelineDeps): Promise<PipelineResult> {
  const { constituents, priceChanges } = loadDatasets(config.files);
  const table = joinConstituents(constituents, priceChanges);
  log.info(
    { constituents: constituents.rows.length, priceChanges: priceChanges.rows.length, joined: table.size },
    "joined datasets"
  );

  const sectorAgent = new SectorAgent(
    metrics ? instrumentClient(client, metrics, "classifier") : client,
    { model: config.models.sector, onError: config.onClassifyError },
    bus
  );
  await sectorAgent.init();
  const classification = await sectorAgent.run(table);
  if (classification.failed > 0) {
    log.warn({ failed: classification.failed, classified: classification.classified }, "some rows have no sector");
  }

  const tally = tallySectors(table.rows());
  out("Sector counts:");
  formatTally(tally).forEach((line) => out(line));

  const recommender = new RecommendationAgent(
    metrics ? instrumentClient(client, metrics, "recommender") : client,
    { model: config.models.recommendation, indexName: config.indexName },
    bus
  );
  await recommender.init();
  const recommendation = await recommender.run(table);
  out("\nStock Recommendations:");
  out(recommendation);

  return { table, classification, tally, recommendation };
}
