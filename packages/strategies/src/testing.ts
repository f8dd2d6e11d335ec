import { loadPromptSet } from "@ragweave/core";
import { HashingEmbeddingProvider } from "@ragweave/embeddings/testing";
import type { RerankResult, Reranker, TokenCounter } from "@ragweave/llm";
import { ScriptedChatModel } from "@ragweave/llm/testing";
import { createSilentLogger } from "@ragweave/logger";
import { createRecordingTracer } from "@ragweave/observability/testing";
import { InMemoryVectorStore } from "@ragweave/vector-store";
import type { StrategyDependencies } from "./dependencies.js";

export const TEST_ENV = {
  OPENAI_API_KEY: "test-key",
  LANGFUSE_PUBLIC_KEY: "pk-test",
  LANGFUSE_SECRET_KEY: "sk-test",
  COHERE_API_KEY: "test-key",
};

/** Scores candidates by how many query words they contain. */
export class KeywordReranker implements Reranker {
  readonly calls: { query: string; documents: string[]; topN: number }[] = [];

  async rerank(query: string, documents: string[], topN: number): Promise<RerankResult[]> {
    this.calls.push({ query, documents, topN });
    const words = query.toLowerCase().split(/\s+/).filter(Boolean);
    return documents
      .map((document, index) => ({
        index,
        score: words.filter((word) => document.toLowerCase().includes(word)).length,
      }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, topN);
  }
}

export const lengthTokenCounter: TokenCounter = { count: (text) => text.length };

export type TestDependencyOverrides = Partial<StrategyDependencies> & {
  models?: Record<string, ScriptedChatModel>;
};

/**
 * In-process dependencies: memory store with hashing embeddings, scripted chat
 * models keyed by model name, keyword reranker, recording tracer.
 */
export function createTestDependencies(overrides: TestDependencyOverrides = {}): StrategyDependencies & {
  models: Record<string, ScriptedChatModel>;
} {
  const { models = {}, ...rest } = overrides;
  const embeddings = new HashingEmbeddingProvider(256);

  return {
    store: new InMemoryVectorStore({ embeddings }),
    chatModelFactory: (modelName) => {
      const model = models[modelName] ?? new ScriptedChatModel(["Final Answer: none"], modelName);
      models[modelName] = model;
      return model;
    },
    reranker: new KeywordReranker(),
    tokenCounterFactory: () => lengthTokenCounter,
    tracer: createRecordingTracer(),
    prompts: loadPromptSet(),
    isolation: "required",
    env: TEST_ENV,
    logger: createSilentLogger(),
    batch: { sleep: async () => {} },
    ...rest,
    models,
  };
}
