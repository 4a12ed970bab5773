import { BaseStage } from "@sector-report/interfaces";
import type { ConstituentTable, PipelineBus } from "@sector-report/pipeline-core";
import { describeError } from "@sector-report/pipeline-core";
import { isKnownSector, type ClassifyOnError } from "@sector-report/schemas";
import type { CompletionClient } from "@sector-report/llm";
import { classifySector } from "./utils/llm";

export type ClassificationOutcome =
  | { ok: true; symbol: string; position: number; label: string; known: boolean }
  | { ok: false; symbol: string; position: number; error: unknown };

export type ClassificationReport = {
  outcomes: ClassificationOutcome[];
  classified: number;
  failed: number;
  offTaxonomy: string[];
};

export type SectorAgentOptions = {
  model: string;
  onError?: ClassifyOnError;
};

export class SectorAgent extends BaseStage<ConstituentTable, ClassificationReport> {
  private readonly client: CompletionClient;
  private readonly model: string;
  private readonly onError: ClassifyOnError;

  constructor(client: CompletionClient, options: SectorAgentOptions, bus: PipelineBus | null = null) {
    super("sector-agent", "classifier", bus);
    this.client = client;
    this.model = options.model;
    this.onError = options.onError ?? "abort";
  }

  async classify(symbol: string, position: number): Promise<ClassificationOutcome> {
    try {
      const label = await classifySector(this.client, symbol, this.model);
      return { ok: true, symbol, position, label, known: isKnownSector(label) };
    } catch (error) {
      return { ok: false, symbol, position, error };
    }
  }

  /**
   * Labels every row in table order, one request at a time. Labels are written
   * through updateByKey, so rows classified before an abort keep their sector,
   * and in skip mode a failed row keeps the label a same-symbol row wrote.
   */
  async run(table: ConstituentTable): Promise<ClassificationReport> {
    const started = Date.now();
    const symbols = table.symbols();
    this.emit("stage_started", { stage: this.role, rows: symbols.length });

    const outcomes: ClassificationOutcome[] = [];
    for (const [position, symbol] of symbols.entries()) {
      const outcome = await this.classify(symbol, position);
      outcomes.push(outcome);
      if (outcome.ok) {
        table.updateByKey(symbol, { sector: outcome.label });
        this.emit("row_classified", { symbol, position, label: outcome.label, known: outcome.known });
        continue;
      }
      this.emit("row_failed", { symbol, position, error: describeError(outcome.error) });
      if (this.onError === "abort") throw outcome.error;
    }

    const report: ClassificationReport = {
      outcomes,
      classified: outcomes.filter((o) => o.ok).length,
      failed: outcomes.filter((o) => !o.ok).length,
      offTaxonomy: [...new Set(outcomes.flatMap((o) => (o.ok && !o.known ? [o.label] : [])))],
    };
    this.emit("stage_completed", { stage: this.role, rows: report.classified, durationMs: Date.now() - started });
    return report;
  }
}
