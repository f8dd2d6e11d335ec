export type {
  IVectorStore,
  SearchParams,
  DeleteParams,
  ScoredDocument,
} from "./vector-store.interface.js";
export { resolveNamespace, DEFAULT_NAMESPACE } from "./namespace.js";
export {
  executeDelete,
  emulateFilterDelete,
  deleteIdsInBatches,
  FILTER_DELETE_TOP_K,
  DELETE_BATCH_SIZE,
} from "./delete-protocol.js";
export type { DeleteOperations } from "./delete-protocol.js";
export { QdrantVectorStore, buildFilter } from "./qdrant-adapter.js";
export type { QdrantVectorStoreConfig, FilterDeleteMode } from "./qdrant-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./in-memory-store.js";
export type { InMemoryVectorStoreConfig } from "./in-memory-store.js";
