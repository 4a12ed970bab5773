import type { Provider } from "@sector-report/schemas";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  model: string;
  /** Alternative outputs, in the order the provider returned them. */
  candidates: string[];
  usage?: TokenUsage;
}

export interface CompletionClient {
  readonly provider: Provider;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
