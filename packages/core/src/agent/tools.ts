import type { MetadataFilter } from "@ragweave/types";
import { IS_SUMMARY_KEY } from "@ragweave/types";
import type { IVectorStore } from "@ragweave/vector-store";
import { mergeFilters } from "../filter-validator.js";
import type { AgentTool } from "./types.js";

export const CHUNK_RETRIEVER_NAME = "Chunk Retriever";
export const SUMMARY_RETRIEVER_NAME = "Summary Retriever";

export interface RetrieverToolOptions {
  name: string;
  description: string;
  store: IVectorStore;
  k: number;
  namespace: string;
  /** Caller filters, merged under the tool's own scope. */
  filters?: MetadataFilter;
  scope: MetadataFilter;
}

export function createRetrieverTool(options: RetrieverToolOptions): AgentTool {
  const filter = mergeFilters(options.filters, options.scope);

  return {
    name: options.name,
    description: options.description,
    async run(input, run) {
      const span = run.trace.span({ name: options.name, input, metadata: { filter } });
      try {
        const hits = await options.store.similaritySearch(input, {
          k: options.k,
          namespace: options.namespace,
          filter,
        });
        const documents = hits.map(({ id, content, metadata }) => ({ id, content, metadata }));
        span.update({ output: { documents: documents.length } });
        return documents;
      } finally {
        span.end();
      }
    },
  };
}

export interface RetrieverToolsetOptions {
  store: IVectorStore;
  k: number;
  namespace: string;
  filters?: MetadataFilter;
  chunkDescription: string;
  summaryDescription: string;
}

/** The chunk retriever (`is_summary=false`) and the summary retriever (`is_summary=true`). */
export function createRetrieverTools(options: RetrieverToolsetOptions): AgentTool[] {
  const shared = {
    store: options.store,
    k: options.k,
    namespace: options.namespace,
    filters: options.filters,
  };

  return [
    createRetrieverTool({
      ...shared,
      name: CHUNK_RETRIEVER_NAME,
      description: options.chunkDescription,
      scope: { [IS_SUMMARY_KEY]: false },
    }),
    createRetrieverTool({
      ...shared,
      name: SUMMARY_RETRIEVER_NAME,
      description: options.summaryDescription,
      scope: { [IS_SUMMARY_KEY]: true },
    }),
  ];
}
