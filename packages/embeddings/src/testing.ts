export { HashingEmbeddingProvider } from "./hashing-provider.js";
