import { createChunker, type IChunker } from "@ragweave/chunker";
import { assertModelCredentials, type VanillaConfig } from "@ragweave/config";
import { Pipeline, createChunkPipeline } from "@ragweave/core";
import type {
  DeindexOptions,
  Document,
  IndexAcknowledgement,
  IndexOptions,
  InvokeOptions,
  RetrievalStrategy,
} from "@ragweave/types";
import type { StrategyDependencies } from "./dependencies.js";
import { StrategyRuntime, emptyAcknowledgement } from "./runtime.js";

/** `RAG-vanilla-v1`: chunk and embed on index, plain similarity search on invoke. */
export class VanillaRAG implements RetrievalStrategy {
  readonly id = "RAG-vanilla-v1";
  private readonly runtime: StrategyRuntime;
  private readonly splitter: IChunker;

  constructor(
    readonly config: VanillaConfig,
    deps: StrategyDependencies,
  ) {
    assertModelCredentials(deps.env);
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

    return this.runtime.traced("invoke", namespace, query, (run) =>
      Pipeline.from("retrieve", (text: string) =>
        this.runtime.deps.store.similaritySearch(text, { k: this.config.k, namespace, filter }),
      )
        .pipe("present", (hits) => this.runtime.present(hits, namespace, filter))
        .invoke(query, run),
    );
  }

  deindex(options: DeindexOptions): Promise<void> {
    return this.runtime.deindex(options);
  }
}
