import { BaseStage } from "@sector-report/interfaces";
import type { ConstituentTable, PipelineBus } from "@sector-report/pipeline-core";
import type { CompletionClient } from "@sector-report/llm";
import { buildRecommendationPrompt, recommendSectors } from "./utils/llm";

export type RecommendationAgentOptions = {
  model: string;
  indexName?: string;
};

export class RecommendationAgent extends BaseStage<ConstituentTable, string> {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: RecommendationAgentOptions,
    bus: PipelineBus | null = null
  ) {
    super("recommendation-agent", "recommender", bus);
  }

  async run(table: ConstituentTable): Promise<string> {
    const started = Date.now();
    this.emit("stage_started", { stage: this.role, rows: table.size });
    const prompt = buildRecommendationPrompt(this.options.indexName ?? "Nasdaq-100", table.render());
    const text = await recommendSectors(this.client, prompt, this.options.model);
    this.emit("stage_completed", { stage: this.role, rows: table.size, durationMs: Date.now() - started });
    return text;
  }
}
