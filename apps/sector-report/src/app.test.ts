import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, DatasetError } from "@sector-report/pipeline-core";
import type { CompletionClient, CompletionRequest } from "@sector-report/llm";
import { loadConfig } from "@sector-report/config";
import { runApp } from "./app";
import { runPipeline } from "./pipeline";
import { createMetrics } from "./metrics/registry";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "sector-report-"));
  writeFileSync(join(dir, "constituents.csv"), "symbol,name\nAAPL,Apple Inc.\nMSFT,Microsoft Corp.\nZZZZ,Unknown Co.\n");
  writeFileSync(join(dir, "prices.csv"), "symbol,ytd\nAAPL,10\nMSFT,-5\n");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function env(extra: Record<string, string> = {}): Record<string, string> {
  return {
    OPENAI_API_KEY: "test-secret",
    CONSTITUENTS_FILE: join(dir, "constituents.csv"),
    PRICE_CHANGE_FILE: join(dir, "prices.csv"),
    ...extra,
  };
}

function stubClient() {
  const requests: CompletionRequest[] = [];
  const client: CompletionClient = {
    provider: "openai",
    async complete(request) {
      requests.push(request);
      const isSector = request.messages[0].content.startsWith("Classify company");
      return { model: request.model, candidates: [isSector ? "Technology" : "Buy Technology."] };
    },
  };
  return { client, requests };
}

describe("sector report", () => {
  it("joins, classifies, tallies and recommends", async () => {
    const { client, requests } = stubClient();
    const lines: string[] = [];
    const result = await runApp(env(), { createClient: () => client, out: (line) => lines.push(line) });

    expect(result.table.symbols()).toEqual(["AAPL", "MSFT"]);
    expect(result.table.rows().map((r) => r.sector)).toEqual(["Technology", "Technology"]);
    expect(result.tally).toEqual({ Technology: 2 });
    expect(result.recommendation).toBe("Buy Technology.");
    expect(requests).toHaveLength(3);
    expect(lines).toEqual(["Sector counts:", "Technology  2", "\nStock Recommendations:", "Buy Technology."]);
  });

  it("fails before building a client when the credential is missing", async () => {
    const createClient = vi.fn();
    const { OPENAI_API_KEY: _omitted, ...rest } = env();
    await expect(runApp(rest, { createClient })).rejects.toThrow(ConfigError);
    expect(createClient).not.toHaveBeenCalled();
  });

  it("fails on a missing input before any completion request", async () => {
    const { client, requests } = stubClient();
    const run = runApp(env({ PRICE_CHANGE_FILE: join(dir, "absent.csv") }), { createClient: () => client, out: () => {} });
    await expect(run).rejects.toThrow(DatasetError);
    expect(requests).toHaveLength(0);
  });

  it("counts completion requests per stage", async () => {
    const { client } = stubClient();
    const metrics = createMetrics();
    await runPipeline({ config: loadConfig(env()), client, metrics, out: () => {} });

    const { values } = await metrics.requests.get();
    const count = (stage: string) => values.find((v) => v.labels.stage === stage && v.labels.outcome === "ok")?.value;
    expect(count("classifier")).toBe(2);
    expect(count("recommender")).toBe(1);
  });
});
