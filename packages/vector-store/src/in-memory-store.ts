import { randomUUID } from "node:crypto";
import type { Document, MetadataFilter, NamespaceIsolation } from "@ragweave/types";
import type { IEmbeddingProvider } from "@ragweave/embeddings";
import type { Logger } from "@ragweave/logger";
import type {
  DeleteParams,
  IVectorStore,
  ScoredDocument,
  SearchParams,
} from "./vector-store.interface.js";
import { resolveNamespace } from "./namespace.js";
import { executeDelete } from "./delete-protocol.js";
import type { DeleteOperations } from "./delete-protocol.js";

interface StoredVector {
  vector: number[];
  content: string;
  metadata: Record<string, unknown>;
}

export interface InMemoryVectorStoreConfig {
  embeddings: IEmbeddingProvider;
  isolation?: NamespaceIsolation;
  logger?: Logger;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error("Vectors must have the same length");
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

function matchesFilter(metadata: Record<string, unknown>, filter?: MetadataFilter): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

/**
 * Vector store held in process memory, partitioned by namespace. Has no native
 * filter delete, so `delete({ filter })` goes through the bounded zero-vector scan.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  readonly supportsFilterDelete = false;
  private readonly embeddings: IEmbeddingProvider;
  private readonly isolation: NamespaceIsolation;
  private readonly logger?: Logger;
  private readonly namespaces = new Map<string, Map<string, StoredVector>>();

  constructor(config: InMemoryVectorStoreConfig) {
    this.embeddings = config.embeddings;
    this.isolation = config.isolation ?? "required";
    this.logger = config.logger;
  }

  async upsert(documents: readonly Document[], namespace?: string): Promise<string[]> {
    const ns = resolveNamespace(namespace, this.isolation);
    if (documents.length === 0) return [];

    const { embeddings } = await this.embeddings.batchEmbed(
      documents.map((document) => document.content),
      "document",
    );

    const partition = this.partition(ns);
    return documents.map((document, i) => {
      const id = randomUUID();
      partition.set(id, {
        vector: embeddings[i] ?? [],
        content: document.content,
        metadata: { ...document.metadata },
      });
      return id;
    });
  }

  async similaritySearch(query: string, params: SearchParams): Promise<ScoredDocument[]> {
    const ns = resolveNamespace(params.namespace, this.isolation);
    const { embeddings } = await this.embeddings.embed(query, "query");
    return this.searchByVector(embeddings[0] ?? [], ns, params.k, params.filter);
  }

  async delete(params: DeleteParams): Promise<void> {
    const ns = resolveNamespace(params.namespace, this.isolation);
    await executeDelete(params, ns, this.operations(), this.logger);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of vectors stored under `namespace`. */
  count(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }

  private partition(namespace: string): Map<string, StoredVector> {
    let partition = this.namespaces.get(namespace);
    if (!partition) {
      partition = new Map();
      this.namespaces.set(namespace, partition);
    }
    return partition;
  }

  private searchByVector(
    vector: readonly number[],
    namespace: string,
    k: number,
    filter?: MetadataFilter,
  ): ScoredDocument[] {
    const results: ScoredDocument[] = [];

    for (const [id, stored] of this.namespaces.get(namespace) ?? []) {
      if (!matchesFilter(stored.metadata, filter)) continue;
      results.push({
        id,
        content: stored.content,
        metadata: { ...stored.metadata },
        score: cosineSimilarity(vector, stored.vector),
      });
    }

    // Array.prototype.sort is stable: equal scores keep insertion order
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, k);
  }

  private operations(): DeleteOperations {
    return {
      deleteIds: async (ids, namespace) => {
        const partition = this.namespaces.get(namespace);
        for (const id of ids) partition?.delete(id);
      },
      deleteNamespace: async (namespace) => {
        this.namespaces.delete(namespace);
      },
      matchIds: async (filter, namespace, limit) => {
        const zero = new Array<number>(this.embeddings.dimensions).fill(0);
        return this.searchByVector(zero, namespace, limit, filter).map((match) => match.id);
      },
    };
  }
}
