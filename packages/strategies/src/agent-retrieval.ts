import { createChunker, type IChunker } from "@ragweave/chunker";
import {
  DEFAULT_INDEX_MODEL,
  DEFAULT_INDEX_TOKEN_LIMIT,
  assertModelCredentials,
  type AgentConfig,
} from "@ragweave/config";
import {
  AgentController,
  checkSummaryBudget,
  createChunkAndSummaryPipeline,
  createChunkPipeline,
  createRetrieverTools,
  createSummarizer,
  createSummaryPipeline,
  type AgentPolicy,
  type PromptSet,
} from "@ragweave/core";
import { ConfigurationError } from "@ragweave/errors";
import type { ChatModel } from "@ragweave/llm";
import type {
  DeindexOptions,
  Document,
  IndexAcknowledgement,
  IndexOptions,
  InvokeOptions,
  StrategyId,
} from "@ragweave/types";
import type { StrategyDependencies } from "./dependencies.js";
import { StrategyRuntime, emptyAcknowledgement } from "./runtime.js";

export type PolicyFactory = (llm: ChatModel, prompts: PromptSet) => AgentPolicy;

export interface IndexModel {
  modelName: string;
  llmTokenLimit: number;
}

/**
 * Index model and its token limit. The default model has a known limit; a
 * custom model must come with one.
 */
export function resolveIndexModel(config: AgentConfig): IndexModel {
  const modelName = config.indexModel ?? DEFAULT_INDEX_MODEL;
  if (config.llmTokenLimit !== undefined) {
    return { modelName, llmTokenLimit: config.llmTokenLimit };
  }
  if (modelName !== DEFAULT_INDEX_MODEL) {
    throw new ConfigurationError(`indexModel "${modelName}" requires llmTokenLimit`, {
      details: { indexModel: modelName },
    });
  }
  return { modelName, llmTokenLimit: DEFAULT_INDEX_TOKEN_LIMIT };
}

/**
 * Shared engine of the agent strategies: chunks plus one summary per document
 * on index, a bounded tool-using agent over both on invoke. Strategies differ
 * only in the agent policy.
 */
export class AgentRetrieval {
  readonly runtime: StrategyRuntime;
  readonly indexModel: IndexModel;
  private readonly splitter: IChunker;
  private readonly summarySplitter: IChunker;
  private readonly policyFactory: PolicyFactory;

  constructor(
    id: StrategyId,
    readonly config: AgentConfig,
    deps: StrategyDependencies,
    policyFactory: PolicyFactory,
  ) {
    assertModelCredentials(deps.env);
    this.runtime = new StrategyRuntime(id, deps);
    this.indexModel = resolveIndexModel(config);
    this.policyFactory = policyFactory;
    this.splitter = createChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
    this.summarySplitter = createChunker({
      chunkSize: config.chunkSizeSI,
      chunkOverlap: config.chunkOverlapSI,
    });

    checkSummaryBudget(this.indexModel.llmTokenLimit, config.chunkSizeSI, this.runtime.logger);
    this.runtime.logger.info({ config, indexModel: this.indexModel }, "Strategy constructed");
  }

  async index(documents: Document[], options: IndexOptions = {}): Promise<IndexAcknowledgement> {
    const namespace = this.runtime.namespace(options.namespace);
    if (documents.length === 0) return emptyAcknowledgement();

    const { deps } = this.runtime;
    const llm = deps.chatModelFactory(this.indexModel.modelName);
    const batch = { ...deps.batch, userTier: this.config.userTier, logger: this.runtime.logger };
    const summarizer = createSummarizer({
      llm,
      splitter: this.summarySplitter,
      summarizePrompt: deps.prompts.summarize,
      mapPrompt: deps.prompts.summarizeShort,
      tokenCounter: deps.tokenCounterFactory(this.indexModel.modelName),
      llmTokenLimit: this.indexModel.llmTokenLimit,
      batch,
    });

    const pipeline = createChunkAndSummaryPipeline(
      createChunkPipeline({ splitter: this.splitter, store: deps.store, namespace }),
      createSummaryPipeline({ summarizer, store: deps.store, namespace, batch }),
    );

    return this.runtime.traced("index", namespace, { documents: documents.length }, async (run) => {
      const prepared = this.runtime.prepare(documents, namespace, options);
      const { chunkIds, summaryIds } = await pipeline.invoke(prepared, run);

      this.runtime.logger.info(
        { namespace, documents: documents.length, chunks: chunkIds.length, summaries: summaryIds.length },
        "Indexed",
      );
      return { documents: documents.length, chunkIds, summaryIds };
    });
  }

  async invoke(query: string, options: InvokeOptions = {}): Promise<Document[]> {
    this.runtime.assertQuery(query);
    const namespace = this.runtime.namespace(options.namespace);
    const filter = this.runtime.filters(options.filters);
    const { deps } = this.runtime;

    const controller = new AgentController({
      policy: this.policyFactory(deps.chatModelFactory(this.config.invokeModel), deps.prompts),
      tools: createRetrieverTools({
        store: deps.store,
        k: this.config.k,
        namespace,
        filters: filter,
        chunkDescription: deps.prompts.chunkRetrieverDescription,
        summaryDescription: deps.prompts.summaryRetrieverDescription,
      }),
      maxIterations: this.config.maxIterations,
      logger: this.runtime.logger,
    });

    return this.runtime.traced("invoke", namespace, query, async (run) => {
      const result = await controller.run(query, run);
      this.runtime.logger.debug(
        { namespace, steps: result.steps.length, answer: result.answer },
        "Agent finished",
      );
      return this.runtime.present(result.documents.slice(0, this.config.k), namespace, filter);
    });
  }

  deindex(options: DeindexOptions): Promise<void> {
    return this.runtime.deindex(options);
  }
}
