import type { ChunkerOptions, IChunker } from "./chunker.interface.js";
import { RecursiveCharacterSplitter } from "./recursive-chunker.js";

export function createChunker(options: ChunkerOptions): IChunker {
  return new RecursiveCharacterSplitter(options);
}
