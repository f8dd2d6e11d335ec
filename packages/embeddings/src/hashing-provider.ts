import type { EmbeddingResult, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 256;

// FNV-1a, 32 bit
function hash(token: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Deterministic bag-of-words embedder. Each lower-cased word increments one
 * hashed dimension, so texts sharing words have a positive cosine similarity and
 * the empty text embeds to the zero vector. Runs in process; used by tests and
 * local development.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "hashing";
  readonly dimensions: number;

  constructor(dimensions = DEFAULT_DIMENSIONS) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map((text) => this.vectorize(text)),
      model: "hashing",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const slot = hash(token) % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }
}
