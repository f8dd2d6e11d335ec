import { RateLimitedError } from "@ragweave/errors";
import type { IChunker } from "@ragweave/chunker";
import type { ChatModel, TokenCounter } from "@ragweave/llm";
import type { Logger } from "@ragweave/logger";
import { IS_SUMMARY_KEY } from "@ragweave/types";
import type { Document } from "@ragweave/types";
import { batchInvokeWithRetry, type BatchInvokeOptions } from "./batch-invoker.js";
import { Pipeline, route } from "./pipeline.js";
import { formatPrompt } from "./prompts.js";

/** Rough characters-per-token ratio used for the summary budget check. */
export const CHARS_PER_TOKEN = 4;
export const SUMMARY_BUDGET_SLACK_CHARS = 4_000;

/**
 * Summarize a whole document with one completion. The summary keeps the source
 * metadata and is tagged `is_summary=true`.
 */
export function createStuffChain(
  llm: ChatModel,
  template: string,
  name = "stuff",
): Pipeline<Document, Document> {
  return Pipeline.from(name, async (document: Document, run): Promise<Document> => {
    const prompt = formatPrompt(template, { context: document.content });
    const summary = await llm.complete(prompt, { observer: run.trace, name });
    return {
      content: summary.trim(),
      metadata: { ...document.metadata, [IS_SUMMARY_KEY]: true },
    };
  });
}

/** Space-join partial summaries under the first one's metadata. */
export function mergeSummaries(summaries: readonly Document[]): Document {
  return {
    content: summaries.map((summary) => summary.content).join(" "),
    metadata: { ...summaries[0]?.metadata, [IS_SUMMARY_KEY]: true },
  };
}

export interface MapReduceOptions {
  llm: ChatModel;
  splitter: IChunker;
  /** Full-length summary prompt, used by the reduce step. */
  summarizePrompt: string;
  /** Short-form prompt applied to every large chunk. */
  mapPrompt: string;
  batch?: BatchInvokeOptions;
}

/**
 * split → map (batched, rate-limit aware) → merge → reduce.
 *
 * Fails with RateLimitedError when every map batch was dropped, since there is
 * nothing left to reduce.
 */
export function createMapReduceChain(options: MapReduceOptions): Pipeline<Document, Document> {
  const mapChain = createStuffChain(options.llm, options.mapPrompt, "map-summarize");

  return Pipeline.from("split", (document: Document) => options.splitter.splitDocuments([document]))
    .pipe("map", async (chunks, run) => {
      const batches = await batchInvokeWithRetry(mapChain, chunks, { ...options.batch, run });
      const summaries = batches.flat();
      if (chunks.length > 0 && summaries.length === 0) {
        throw new RateLimitedError("Every summarization batch was rate limited");
      }
      return summaries;
    })
    .pipe("merge", mergeSummaries)
    .andThen(createStuffChain(options.llm, options.summarizePrompt, "reduce"));
}

export interface SummarizerOptions extends MapReduceOptions {
  tokenCounter: TokenCounter;
  /** Documents up to this many tokens are summarized in one call. */
  llmTokenLimit: number;
}

/** Per-document choice between the stuff and map-reduce paths. */
export function createSummarizer(options: SummarizerOptions): Pipeline<Document, Document> {
  const stuff = createStuffChain(options.llm, options.summarizePrompt);
  const mapReduce = createMapReduceChain(options);

  return route("summarize", (document: Document) =>
    options.tokenCounter.count(document.content) <= options.llmTokenLimit ? stuff : mapReduce,
  );
}

/**
 * Warn when the summary chunk size may not fit the index model's token limit,
 * using the 4-characters-per-token estimate. Returns whether it warned.
 */
export function checkSummaryBudget(
  llmTokenLimit: number,
  chunkSizeSI: number,
  logger: Logger,
): boolean {
  if (llmTokenLimit * CHARS_PER_TOKEN >= chunkSizeSI + SUMMARY_BUDGET_SLACK_CHARS) return false;

  logger.warn(
    { llmTokenLimit, chunkSizeSI },
    "Summary chunk size may exceed the index model's token limit; summaries can be truncated",
  );
  return true;
}
