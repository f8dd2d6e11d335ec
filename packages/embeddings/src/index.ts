export type {
  IEmbeddingProvider,
  EmbeddingInputType,
  EmbeddingResult,
} from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig } from "./openai-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
