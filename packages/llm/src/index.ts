import type { Provider } from "@sector-report/schemas";
import { CompletionError } from "@sector-report/pipeline-core";
import { AnthropicCompletionClient } from "./anthropic";
import { OpenAICompletionClient } from "./openai";
import type { CompletionClient, CompletionResponse } from "./types";

export type { ChatMessage, ChatRole, CompletionClient, CompletionRequest, CompletionResponse, TokenUsage } from "./types";
export { AnthropicCompletionClient } from "./anthropic";
export { OpenAICompletionClient } from "./openai";

export const DEFAULT_MODELS: Record<Provider, string> = {
  openai: "gpt-3.5-turbo",
  anthropic: "claude-3-haiku-20240307",
};

export interface ClientOptions {
  provider: Provider;
  apiKey: string;
}

export type ClientFactory = (options: ClientOptions) => CompletionClient;

export const createCompletionClient: ClientFactory = ({ provider, apiKey }) =>
  provider === "anthropic" ? new AnthropicCompletionClient(apiKey) : new OpenAICompletionClient(apiKey);

/** The first candidate's text, verbatim. */
export function firstCandidate(res: CompletionResponse, provider: string): string {
  const [first] = res.candidates;
  if (first === undefined) {
    throw new CompletionError(provider, `completion from ${res.model} returned no candidates`);
  }
  return first;
}
