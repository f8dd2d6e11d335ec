export type { IChunker, ChunkerOptions } from "./chunker.interface.js";
export { RecursiveCharacterSplitter, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export { removeNewlines, cleanDocuments } from "./cleaner.js";
export { createChunker } from "./factory.js";
