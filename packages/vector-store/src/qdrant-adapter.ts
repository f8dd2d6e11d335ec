import { randomUUID } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { Document, MetadataFilter, MetadataFilterValue, NamespaceIsolation } from "@ragweave/types";
import { toProviderError } from "@ragweave/errors";
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

const BATCH_SIZE = 100;

type Condition =
  | { key: string; match: { value: MetadataFilterValue } }
  | { has_id: string[] };

interface Filter {
  must: Condition[];
}

export type FilterDeleteMode = "native" | "emulated";

export interface QdrantVectorStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
  embeddings: IEmbeddingProvider;
  isolation?: NamespaceIsolation;
  /** "emulated" deletes by filter through the bounded id scan instead of Qdrant's filter delete. */
  filterDelete?: FilterDeleteMode;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Namespace condition first, then one `metadata.<key>` match per filter entry. */
export function buildFilter(namespace: string, filter?: MetadataFilter): Filter {
  const must: Condition[] = [{ key: "namespace", match: { value: namespace } }];
  for (const [key, value] of Object.entries(filter ?? {})) {
    must.push({ key: `metadata.${key}`, match: { value } });
  }
  return { must };
}

/**
 * Qdrant adapter. Every point carries `{ namespace, content, metadata }` as payload;
 * every query, scroll and delete is constrained to one namespace.
 */
export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  readonly supportsFilterDelete: boolean;
  private client: QdrantClient;
  private collection: string;
  private embeddings: IEmbeddingProvider;
  private isolation: NamespaceIsolation;
  private logger?: Logger;

  constructor(config: QdrantVectorStoreConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.collection = config.collection;
    this.embeddings = config.embeddings;
    this.isolation = config.isolation ?? "required";
    this.supportsFilterDelete = (config.filterDelete ?? "native") === "native";
    this.logger = config.logger;
  }

  async upsert(documents: readonly Document[], namespace?: string): Promise<string[]> {
    const ns = resolveNamespace(namespace, this.isolation);
    if (documents.length === 0) return [];

    const { embeddings } = await this.embeddings.batchEmbed(
      documents.map((document) => document.content),
      "document",
    );
    const ids = documents.map(() => randomUUID());

    for (let i = 0; i < documents.length; i += BATCH_SIZE) {
      const points = documents.slice(i, i + BATCH_SIZE).map((document, j) => ({
        id: ids[i + j] ?? randomUUID(),
        vector: embeddings[i + j] ?? [],
        payload: {
          namespace: ns,
          content: document.content,
          metadata: { ...document.metadata },
        },
      }));

      await this.call(() => this.client.upsert(this.collection, { wait: true, points }));
    }

    return ids;
  }

  async similaritySearch(query: string, params: SearchParams): Promise<ScoredDocument[]> {
    const ns = resolveNamespace(params.namespace, this.isolation);
    const { embeddings } = await this.embeddings.embed(query, "query");

    const results = await this.call(() =>
      this.client.search(this.collection, {
        vector: embeddings[0] ?? [],
        limit: params.k,
        filter: buildFilter(ns, params.filter),
        with_payload: true,
      }),
    );

    return results.map((result) => {
      const content = result.payload?.["content"];
      const metadata = result.payload?.["metadata"];
      return {
        id: String(result.id),
        score: result.score,
        content: typeof content === "string" ? content : "",
        metadata: isRecord(metadata) ? { ...metadata } : {},
      };
    });
  }

  async delete(params: DeleteParams): Promise<void> {
    const ns = resolveNamespace(params.namespace, this.isolation);
    await executeDelete(params, ns, this.operations(), this.logger);
  }

  async ensureCollection(dimensions: number): Promise<void> {
    const collections = await this.call(() => this.client.getCollections());
    const exists = collections.collections.some((c) => c.name === this.collection);

    if (!exists) {
      await this.call(() =>
        this.client.createCollection(this.collection, {
          vectors: {
            size: dimensions,
            distance: "Cosine",
          },
        }),
      );

      // Payload indexes for namespace isolation and the filters strategies use
      for (const [fieldName, schema] of [
        ["namespace", "keyword"],
        ["metadata.project_id", "keyword"],
        ["metadata.file_id", "keyword"],
        ["metadata.is_summary", "bool"],
      ] as const) {
        await this.call(() =>
          this.client.createPayloadIndex(this.collection, {
            field_name: fieldName,
            field_schema: schema,
          }),
        );
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toProviderError("qdrant", error);
    }
  }

  private operations(): DeleteOperations {
    const ops: DeleteOperations = {
      deleteIds: async (ids, namespace) => {
        await this.call(() =>
          this.client.delete(this.collection, {
            wait: true,
            filter: { must: [{ has_id: ids }, ...buildFilter(namespace).must] },
          }),
        );
      },
      deleteNamespace: async (namespace) => {
        await this.call(() =>
          this.client.delete(this.collection, { wait: true, filter: buildFilter(namespace) }),
        );
      },
      matchIds: async (filter, namespace, limit) => {
        const page = await this.call(() =>
          this.client.scroll(this.collection, {
            filter: buildFilter(namespace, filter),
            limit,
            with_payload: false,
            with_vector: false,
          }),
        );
        return page.points.map((point) => String(point.id));
      },
    };

    if (this.supportsFilterDelete) {
      ops.deleteByFilter = async (filter, namespace) => {
        await this.call(() =>
          this.client.delete(this.collection, {
            wait: true,
            filter: buildFilter(namespace, filter),
          }),
        );
      };
    }

    return ops;
  }
}
