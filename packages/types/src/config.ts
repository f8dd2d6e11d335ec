export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderName = "openai" | "cohere";

export type NamespaceIsolation = "required" | "optional";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  redis: RedisConfig;
  qdrant: QdrantConfig;
  embeddings: EmbeddingsConfig;
  openai: OpenAIConfig;
  cohere: CohereConfig;
  langfuse: LangfuseConfig;
  namespaceIsolation: NamespaceIsolation;
}

export interface RedisConfig {
  url: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
}

export interface OpenAIConfig {
  apiKey: string;
  embedModel: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  rerankModel: string;
}

export interface LangfuseConfig {
  publicKey?: string;
  secretKey?: string;
  baseUrl: string;
}
