import { createChunker, type IChunker } from "@ragweave/chunker";
import {
  RERANK_CREDENTIALS,
  assertCredentials,
  assertModelCredentials,
  type RerankConfig,
} from "@ragweave/config";
import { Pipeline, createChunkPipeline } from "@ragweave/core";
import { ConfigurationError } from "@ragweave/errors";
import type { Reranker } from "@ragweave/llm";
import type {
  DeindexOptions,
  Document,
  IndexAcknowledgement,
  IndexOptions,
  InvokeOptions,
  RetrievalStrategy,
} from "@ragweave/types";
import type { ScoredDocument } from "@ragweave/vector-store";
import type { StrategyDependencies } from "./dependencies.js";
import { StrategyRuntime, emptyAcknowledgement } from "./runtime.js";

/**
 * `RAG-rerank-v1-ch`: indexes like the vanilla strategy; on invoke retrieves
 * `kRetrieve` candidates and keeps the reranker's top `kRerank`, in the
 * reranker's order.
 */
export class RerankRAG implements RetrievalStrategy {
  readonly id = "RAG-rerank-v1-ch";
  private readonly runtime: StrategyRuntime;
  private readonly splitter: IChunker;
  private readonly reranker: Reranker;

  constructor(
    readonly config: RerankConfig,
    deps: StrategyDependencies,
  ) {
    assertModelCredentials(deps.env);
    assertCredentials(RERANK_CREDENTIALS, deps.env);
    if (!deps.reranker) {
      throw new ConfigurationError("RAG-rerank-v1-ch requires a reranker");
    }
    this.reranker = deps.reranker;
    this.runtime = new StrategyRuntime(this.id, deps);
    this.splitter = createChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
    this.runtime.logger.info({ config }, "Strategy constructed");
  }

  async index(documents: Document[], options: IndexOptions = {}): Promise<IndexAcknowledgement> {
    const namespace = this.runtime.namespace(options.namespace);
    if (documents.length === 0) return emptyAcknowledgement();

    return this.runtime.traced("index", namespace, { documents: documents.length }, async (run) => {
      const prepared = this.runtime.prepare(documents, namespace, options);
      const chunkIds = await createChunkPipeline({
        splitter: this.splitter,
        store: this.runtime.deps.store,
        namespace,
      }).invoke(prepared, run);

      this.runtime.logger.info({ namespace, documents: documents.length, chunks: chunkIds.length }, "Indexed");
      return { documents: documents.length, chunkIds, summaryIds: [] };
    });
  }

  async invoke(query: string, options: InvokeOptions = {}): Promise<Document[]> {
    this.runtime.assertQuery(query);
    const namespace = this.runtime.namespace(options.namespace);
    const filter = this.runtime.filters(options.filters);
    const { kRetrieve, kRerank } = this.config;

    return this.runtime.traced("invoke", namespace, query, (run) =>
      Pipeline.from("retrieve", (text: string) =>
        this.runtime.deps.store.similaritySearch(text, { k: kRetrieve, namespace, filter }),
      )
        .pipe("rerank", (candidates) => this.rerank(query, candidates, kRerank))
        .pipe("present", (hits) => this.runtime.present(hits, namespace, filter))
        .invoke(query, run),
    );
  }

  deindex(options: DeindexOptions): Promise<void> {
    return this.runtime.deindex(options);
  }

  private async rerank(
    query: string,
    candidates: ScoredDocument[],
    topN: number,
  ): Promise<ScoredDocument[]> {
    const ranked = await this.reranker.rerank(
      query,
      candidates.map((candidate) => candidate.content),
      topN,
    );

    const reordered: ScoredDocument[] = [];
    for (const { index, score } of ranked.slice(0, topN)) {
      const candidate = candidates[index];
      if (candidate) reordered.push({ ...candidate, score });
    }
    return reordered;
  }
}
