import type { Document, MetadataFilter } from "@ragweave/types";

export interface SearchParams {
  k: number;
  namespace?: string;
  filter?: MetadataFilter;
}

export interface DeleteParams {
  ids?: string[];
  deleteAll?: boolean;
  namespace?: string;
  filter?: MetadataFilter;
}

export interface ScoredDocument extends Document {
  id: string;
  score: number;
}

export interface IVectorStore {
  readonly name: string;
  /** True when `delete({ filter })` runs natively instead of through the bounded scan. */
  readonly supportsFilterDelete: boolean;

  /** Embed and store `documents`; returns one generated id per document, in order. */
  upsert(documents: readonly Document[], namespace?: string): Promise<string[]>;
  /** Best match first, at most `k` results, all from the given namespace. */
  similaritySearch(query: string, params: SearchParams): Promise<ScoredDocument[]>;
  /**
   * Delete by ids, by `deleteAll` (the whole namespace) or by metadata filter.
   * Throws InvalidArgumentError when none of the three is given.
   */
  delete(params: DeleteParams): Promise<void>;
  healthCheck(): Promise<boolean>;
}
