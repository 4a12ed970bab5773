import OpenAI from "openai";
import { CompletionError, createLogger } from "@sector-report/pipeline-core";
import type { ChatMessage, CompletionClient, CompletionRequest, CompletionResponse } from "./types";

const log = createLogger("llm");

function toOpenAIMessage(m: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    case "user":
      return { role: "user", content: m.content };
  }
}

export class OpenAICompletionClient implements CompletionClient {
  readonly provider = "openai" as const;
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    log.debug({ model: request.model, promptLength: request.messages.reduce((n, m) => n + m.content.length, 0) }, "[LLM] calling model");
    const res = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    const usage = res.usage ? { inputTokens: res.usage.prompt_tokens, outputTokens: res.usage.completion_tokens } : undefined;
    log.debug({ usage }, "[LLM] received response");
    const candidates: string[] = [];
    for (const [i, choice] of res.choices.entries()) {
      if (choice.message.content === null) {
        throw new CompletionError(this.provider, `choice ${i} from ${res.model} has no message content`);
      }
      candidates.push(choice.message.content);
    }
    return { model: res.model, candidates, usage };
  }
}
