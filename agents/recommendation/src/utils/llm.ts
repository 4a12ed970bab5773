import { firstCandidate, type CompletionClient } from "@sector-report/llm";

export function buildRecommendationPrompt(indexName: string, renderedTable: string): string {
  return (
    `Provide summary information about ${indexName} stock performance year to date (YTD), ` +
    "recommending the three best sectors and three or more companies per sector. " +
    "Company data: " +
    renderedTable
  );
}

export async function recommendSectors(
  client: CompletionClient,
  prompt: string,
  model: string
): Promise<string> {
  const res = await client.complete({
    model,
    messages: [{ role: "user", content: prompt }],
    temperature: 0,
  });
  return firstCandidate(res, client.provider);
}
