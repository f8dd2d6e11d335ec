import type { Env } from "@ragweave/config";
import type { BatchInvokeOptions, PromptSet } from "@ragweave/core";
import { loadPromptSet } from "@ragweave/core";
import { createEmbeddingProvider } from "@ragweave/embeddings";
import {
  CohereReranker,
  TiktokenCounter,
  createOpenAIChatModelFactory,
  type ChatModelFactory,
  type Reranker,
  type TokenCounter,
} from "@ragweave/llm";
import { createChildLogger, type Logger } from "@ragweave/logger";
import { createTracer, type Tracer } from "@ragweave/observability";
import type { AppConfig, NamespaceIsolation } from "@ragweave/types";
import { QdrantVectorStore, type IVectorStore } from "@ragweave/vector-store";

/** Everything a strategy is built from besides its own configuration. */
export interface StrategyDependencies {
  store: IVectorStore;
  chatModelFactory: ChatModelFactory;
  /** Required by the rerank strategy only. */
  reranker?: Reranker;
  tokenCounterFactory: (modelName: string) => TokenCounter;
  tracer: Tracer;
  prompts: PromptSet;
  isolation: NamespaceIsolation;
  /** Environment checked for credentials at construction. */
  env: Env;
  logger: Logger;
  /** Pacing and retry overrides for summary batches. */
  batch?: Omit<BatchInvokeOptions, "userTier" | "run" | "logger">;
}

export interface CreateDependenciesOptions {
  logger: Logger;
  env?: Env;
  promptDir?: string;
}

/**
 * Production wiring from validated application config: Qdrant (collection
 * ensured), the configured embedding provider, OpenAI chat models, Cohere
 * reranking when a key is present, and Langfuse tracing.
 */
export async function createStrategyDependencies(
  config: AppConfig,
  options: CreateDependenciesOptions,
): Promise<StrategyDependencies> {
  const logger = options.logger;

  const embeddings = createEmbeddingProvider({
    provider: config.embeddings.provider,
    openai: {
      apiKey: config.openai.apiKey,
      model: config.openai.embedModel,
      dimensions: config.embeddings.dimensions,
    },
    cohere: {
      apiKey: config.cohere.apiKey,
      model: config.cohere.embedModel,
      dimensions: config.embeddings.dimensions,
    },
  });

  const store = new QdrantVectorStore({
    url: config.qdrant.url,
    apiKey: config.qdrant.apiKey,
    collection: config.qdrant.collection,
    embeddings,
    isolation: config.namespaceIsolation,
    logger: createChildLogger(logger, { component: "qdrant" }),
  });
  await store.ensureCollection(embeddings.dimensions);

  return {
    store,
    chatModelFactory: createOpenAIChatModelFactory(config.openai.apiKey),
    reranker: config.cohere.apiKey
      ? new CohereReranker({ apiKey: config.cohere.apiKey, model: config.cohere.rerankModel })
      : undefined,
    tokenCounterFactory: (modelName) => new TiktokenCounter(modelName),
    tracer: createTracer(config.langfuse),
    prompts: loadPromptSet(options.promptDir),
    isolation: config.namespaceIsolation,
    env: options.env ?? process.env,
    logger,
  };
}
