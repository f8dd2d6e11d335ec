export type {
  Document,
  DocumentMetadata,
  ReservedMetadataKey,
  SystemMetadata,
  MetadataFilter,
  MetadataFilterValue,
} from "./document.js";
export {
  PROJECT_ID_KEY,
  FILE_ID_KEY,
  USER_ID_KEY,
  FILE_TITLE_KEY,
  IS_SUMMARY_KEY,
  RESERVED_METADATA_KEYS,
} from "./document.js";

export type {
  StrategyId,
  IndexOptions,
  IndexAcknowledgement,
  InvokeOptions,
  DeindexOptions,
  Indexer,
  Retriever,
  Deindexer,
  RetrievalStrategy,
} from "./strategy.js";
export { STRATEGY_IDS } from "./strategy.js";

export type {
  AppConfig,
  NodeEnv,
  LogLevel,
  EmbeddingProviderName,
  NamespaceIsolation,
  RedisConfig,
  QdrantConfig,
  EmbeddingsConfig,
  OpenAIConfig,
  CohereConfig,
  LangfuseConfig,
} from "./config.js";

export type { JobType, JobData, IndexJobData, DeindexJobData, AnyJobData, JobResult } from "./job.js";
