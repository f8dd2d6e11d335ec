export { Pipeline, route, fanOut, NOOP_RUN } from "./pipeline.js";
export type { RunContext, Stage } from "./pipeline.js";

export { loadPromptSet, formatPrompt, DEFAULT_PROMPT_DIR } from "./prompts.js";
export type { PromptSet } from "./prompts.js";

export { batchInvokeWithRetry, batchSizeFor } from "./batch-invoker.js";
export type { BatchInvokeOptions } from "./batch-invoker.js";

export {
  createStuffChain,
  createMapReduceChain,
  createSummarizer,
  mergeSummaries,
  checkSummaryBudget,
} from "./summarize.js";
export type { MapReduceOptions, SummarizerOptions } from "./summarize.js";

export {
  createChunkPipeline,
  createSummaryPipeline,
  createChunkAndSummaryPipeline,
  tagSummary,
} from "./indexing.js";
export type { ChunkPipelineOptions, SummaryPipelineOptions, IndexedIds } from "./indexing.js";

export {
  sanitizeMetadata,
  systemMetadataFor,
  applySystemMetadata,
  stripUntrustedMetadata,
} from "./metadata.js";

export { validateMetadataFilter, mergeFilters } from "./filter-validator.js";
export { formatDocuments } from "./context-assembler.js";

export * from "./agent/index.js";
