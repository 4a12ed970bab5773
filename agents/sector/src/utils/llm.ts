import { SECTORS } from "@sector-report/schemas";
import { firstCandidate, type CompletionClient } from "@sector-report/llm";

export function buildSectorPrompt(symbol: string): string {
  return (
    `Classify company ${symbol} into one of the following sectors. ` +
    `Answer only with the sector name: ${SECTORS.join(", ")}.`
  );
}

/** Returns the model's answer verbatim; it is not checked against the sector list. */
export async function classifySector(client: CompletionClient, symbol: string, model: string): Promise<string> {
  const res = await client.complete({
    model,
    messages: [{ role: "user", content: buildSectorPrompt(symbol) }],
    temperature: 0,
  });
  return firstCandidate(res, client.provider);
}
