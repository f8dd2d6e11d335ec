import { cleanDocuments, type IChunker } from "@ragweave/chunker";
import { RateLimitedError } from "@ragweave/errors";
import { IS_SUMMARY_KEY } from "@ragweave/types";
import type { Document } from "@ragweave/types";
import type { IVectorStore } from "@ragweave/vector-store";
import { batchInvokeWithRetry, type BatchInvokeOptions } from "./batch-invoker.js";
import { fanOut, Pipeline } from "./pipeline.js";

export interface ChunkPipelineOptions {
  splitter: IChunker;
  store: IVectorStore;
  namespace: string;
}

export interface SummaryPipelineOptions {
  summarizer: Pipeline<Document, Document>;
  store: IVectorStore;
  namespace: string;
  batch?: BatchInvokeOptions;
}

export function tagSummary(documents: readonly Document[], isSummary: boolean): Document[] {
  return documents.map((document) => ({
    ...document,
    metadata: { ...document.metadata, [IS_SUMMARY_KEY]: isSummary },
  }));
}

/** clean → chunk → tag `is_summary=false` → upsert; resolves to the chunk ids. */
export function createChunkPipeline(options: ChunkPipelineOptions): Pipeline<Document[], string[]> {
  return Pipeline.from("clean", (documents: Document[]) => cleanDocuments(documents))
    .pipe("chunk", (documents) => options.splitter.splitDocuments(documents))
    .pipe("tag", (chunks) => tagSummary(chunks, false))
    .pipe("upsert", (chunks) => options.store.upsert(chunks, options.namespace));
}

/**
 * clean → summarize each document → upsert; resolves to the summary ids.
 *
 * Documents are summarized in paced batches. A document whose batch stayed rate
 * limited fails the call with RateLimitedError instead of going unsummarized.
 */
export function createSummaryPipeline(
  options: SummaryPipelineOptions,
): Pipeline<Document[], string[]> {
  return Pipeline.from("clean", (documents: Document[]) => cleanDocuments(documents))
    .pipe("summarize", async (documents, run) => {
      const batches = await batchInvokeWithRetry(options.summarizer, documents, { ...options.batch, run });
      const summaries = batches.flat();
      if (summaries.length < documents.length) {
        throw new RateLimitedError(
          `${documents.length - summaries.length} of ${documents.length} documents could not be summarized`,
        );
      }
      return summaries;
    })
    .pipe("upsert", (summaries) => options.store.upsert(summaries, options.namespace));
}

export interface IndexedIds {
  chunkIds: string[];
  summaryIds: string[];
}

/** Chunk and summary streams over the same documents; both must complete. */
export function createChunkAndSummaryPipeline(
  chunk: Pipeline<Document[], string[]>,
  summary: Pipeline<Document[], string[]>,
): Pipeline<Document[], IndexedIds> {
  return fanOut("index", chunk, summary).pipe("collect", ([chunkIds, summaryIds]) => ({
    chunkIds,
    summaryIds,
  }));
}
