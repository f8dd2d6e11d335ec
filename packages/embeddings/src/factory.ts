import type { EmbeddingProviderName } from "@ragweave/types";
import { ConfigurationError } from "@ragweave/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import type { OpenAIProviderConfig } from "./openai-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  cohere?: CohereProviderConfig;
  openai?: OpenAIProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "openai":
      if (!config.openai) {
        throw new ConfigurationError("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider(config.openai);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
