import { describe, it, expect } from "vitest";
import { ConstituentTable } from "@sector-report/pipeline-core";
import { ConstituentRecord } from "@sector-report/schemas";
import type { CompletionClient, CompletionRequest } from "@sector-report/llm";
import { RecommendationAgent } from "./RecommendationAgent";
import { buildRecommendationPrompt } from "./utils/llm";

function enrichedTable(): ConstituentTable {
  return new ConstituentTable(["symbol", "ytd", "sector"], [
    ConstituentRecord.parse({ symbol: "AAPL", ytd: 10, sector: "Technology" }),
    ConstituentRecord.parse({ symbol: "XOM", ytd: -2.5, sector: "Energy" }),
  ]);
}

function stubClient(reply: () => Promise<string>) {
  const requests: CompletionRequest[] = [];
  const client: CompletionClient = {
    provider: "anthropic",
    async complete(request) {
      requests.push(request);
      return { model: request.model, candidates: [await reply()] };
    },
  };
  return { client, requests };
}

describe("RecommendationAgent", () => {
  it("builds the summary prompt around the rendered table", () => {
    expect(buildRecommendationPrompt("Nasdaq-100", "symbol ytd")).toBe(
      "Provide summary information about Nasdaq-100 stock performance year to date (YTD), " +
        "recommending the three best sectors and three or more companies per sector. Company data: symbol ytd"
    );
  });

  it("sends the whole table once and returns the answer verbatim", async () => {
    const { client, requests } = stubClient(async () => "  1. Technology: AAPL\n");
    const table = enrichedTable();
    const text = await new RecommendationAgent(client, { model: "claude-3-haiku-20240307" }).run(table);

    expect(text).toBe("  1. Technology: AAPL\n");
    expect(requests).toEqual([
      {
        model: "claude-3-haiku-20240307",
        temperature: 0,
        messages: [{ role: "user", content: buildRecommendationPrompt("Nasdaq-100", table.render()) }],
      },
    ]);
  });

  it("names the configured index", async () => {
    const { client, requests } = stubClient(async () => "ok");
    await new RecommendationAgent(client, { model: "m", indexName: "S&P 500" }).run(enrichedTable());
    expect(requests[0].messages[0].content.startsWith("Provide summary information about S&P 500 stock")).toBe(true);
  });

  it("propagates service errors", async () => {
    const { client } = stubClient(async () => {
      throw new Error("401 invalid api key");
    });
    await expect(new RecommendationAgent(client, { model: "m" }).run(enrichedTable())).rejects.toThrow("401 invalid api key");
  });
});
