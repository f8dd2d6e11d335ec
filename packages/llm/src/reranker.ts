import { CohereClient } from "cohere-ai";
import { toProviderError } from "@ragweave/errors";

export interface RerankResult {
  /** Position of the document in the input list. */
  index: number;
  score: number;
}

export interface Reranker {
  /** Results best-first; their order is authoritative. */
  rerank(query: string, documents: string[], topN: number): Promise<RerankResult[]>;
}

export interface CohereRerankerConfig {
  apiKey: string;
  model?: string;
}

export class CohereReranker implements Reranker {
  private client: CohereClient;
  private model: string;

  constructor(config: CohereRerankerConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? "rerank-v3.5";
  }

  async rerank(query: string, documents: string[], topN: number): Promise<RerankResult[]> {
    if (documents.length === 0) return [];

    try {
      const response = await this.client.v2.rerank({
        model: this.model,
        query,
        documents,
        topN: Math.min(topN, documents.length),
      });
      return response.results.map((result) => ({
        index: result.index,
        score: result.relevanceScore,
      }));
    } catch (error) {
      throw toProviderError("cohere", error);
    }
  }
}
