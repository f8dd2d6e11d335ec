/** Whether the text is stored in the index or used to query it. */
export type EmbeddingInputType = "document" | "query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
