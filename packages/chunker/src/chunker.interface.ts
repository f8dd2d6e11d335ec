import type { Document } from "@ragweave/types";

export interface ChunkerOptions {
  /** Maximum chunk length in characters. */
  chunkSize: number;
  /** Characters of trailing context carried into the next chunk. */
  chunkOverlap: number;
  separators?: readonly string[];
}

export interface IChunker {
  readonly strategy: string;
  splitText(text: string): string[];
  /** Split each document; every chunk gets its own copy of the parent's metadata. */
  splitDocuments(documents: readonly Document[]): Document[];
}
