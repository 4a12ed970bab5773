import Anthropic from "@anthropic-ai/sdk";
import { createLogger } from "@sector-report/pipeline-core";
import type { CompletionClient, CompletionRequest, CompletionResponse } from "./types";

const log = createLogger("llm");

// the messages API requires an explicit budget
const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = "anthropic" as const;
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const system = request.messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const messages = request.messages
      .filter((m) => m.role !== "system")
      .map((m): Anthropic.MessageParam => ({ role: m.role === "assistant" ? "assistant" : "user", content: m.content }));

    log.debug({ model: request.model, messages: messages.length }, "[LLM] calling model");
    const res = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature,
      messages,
      system: system || undefined,
    });
    const usage = { inputTokens: res.usage.input_tokens, outputTokens: res.usage.output_tokens };
    log.debug({ usage, stopReason: res.stop_reason }, "[LLM] received response");

    // one message per call; its text blocks form the single candidate
    const text = res.content.flatMap((block) => (block.type === "text" ? [block.text] : []));
    return { model: res.model, candidates: text.length > 0 ? [text.join("")] : [], usage };
  }
}
