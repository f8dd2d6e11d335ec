import OpenAI from "openai";
import { toProviderError } from "@ragweave/errors";
import type { ChatModel, ChatModelFactory, CompleteOptions } from "./chat-model.interface.js";

export interface OpenAIChatModelConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenAIChatModel implements ChatModel {
  readonly modelName: string;
  private client: OpenAI;
  private temperature: number;

  constructor(config: OpenAIChatModelConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.modelName = config.model;
    this.temperature = config.temperature ?? 0;
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const generation = options.observer?.generation({
      name: options.name ?? "completion",
      model: this.modelName,
      input: prompt,
    });

    try {
      const response = await this.client.chat.completions.create({
        model: this.modelName,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
        ...(options.stop?.length ? { stop: options.stop } : {}),
      });

      const text = response.choices[0]?.message.content ?? "";
      generation?.update({
        output: text,
        ...(response.usage && {
          usage: {
            input: response.usage.prompt_tokens,
            output: response.usage.completion_tokens,
            total: response.usage.total_tokens,
          },
        }),
      });
      return text;
    } catch (error) {
      const mapped = toProviderError("openai", error);
      generation?.update({ metadata: { error: mapped.message } });
      throw mapped;
    } finally {
      generation?.end();
    }
  }
}

export function createOpenAIChatModelFactory(apiKey: string): ChatModelFactory {
  return (modelName: string): ChatModel => new OpenAIChatModel({ apiKey, model: modelName });
}
