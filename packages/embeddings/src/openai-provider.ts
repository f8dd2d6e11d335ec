import OpenAI from "openai";
import { toProviderError } from "@ragweave/errors";
import type { EmbeddingResult, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 2048; // OpenAI inputs-per-request limit

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/** OpenAI embeddings. The input type is ignored: OpenAI embeds queries and documents alike. */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          dimensions: this.dimensions,
        });

        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map((item) => item.embedding));
        totalTokens += response.usage.total_tokens;
      } catch (error) {
        throw toProviderError("openai", error);
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
