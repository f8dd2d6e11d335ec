import type { Document, MetadataFilter, SystemMetadata } from "./document.js";

export const STRATEGY_IDS = [
  "RAG-vanilla-v1",
  "RAG-rerank-v1-ch",
  "ABM-router-v1-si",
  "ABM-react-v1-si",
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export interface IndexOptions {
  /** System-assigned metadata (project id, file id, title) applied to every document. */
  metadata?: SystemMetadata;
  namespace?: string;
}

export interface IndexAcknowledgement {
  documents: number;
  chunkIds: string[];
  summaryIds: string[];
}

export interface InvokeOptions {
  filters?: MetadataFilter;
  namespace?: string;
}

export interface DeindexOptions {
  ids?: string[];
  deleteAll?: boolean;
  namespace?: string;
  filter?: MetadataFilter;
}

export interface Indexer {
  index(documents: Document[], options?: IndexOptions): Promise<IndexAcknowledgement>;
}

export interface Retriever {
  invoke(query: string, options?: InvokeOptions): Promise<Document[]>;
}

export interface Deindexer {
  deindex(options: DeindexOptions): Promise<void>;
}

export interface RetrievalStrategy extends Indexer, Retriever, Deindexer {
  readonly id: StrategyId;
}
