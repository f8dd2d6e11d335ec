import type { AgentConfig } from "@ragweave/config";
import { createRouterPolicy } from "@ragweave/core";
import type {
  DeindexOptions,
  Document,
  IndexAcknowledgement,
  IndexOptions,
  InvokeOptions,
  RetrievalStrategy,
} from "@ragweave/types";
import { AgentRetrieval } from "./agent-retrieval.js";
import type { StrategyDependencies } from "./dependencies.js";

/**
 * `ABM-router-v1-si`: chunks and per-document summaries on index; on invoke
 * one model call picks the chunk or the summary retriever for the question.
 */
export class RouterAgentRAG implements RetrievalStrategy {
  readonly id = "ABM-router-v1-si";
  private readonly engine: AgentRetrieval;

  constructor(config: AgentConfig, deps: StrategyDependencies) {
    this.engine = new AgentRetrieval(this.id, config, deps, (llm, prompts) =>
      createRouterPolicy(llm, prompts.router),
    );
  }

  index(documents: Document[], options?: IndexOptions): Promise<IndexAcknowledgement> {
    return this.engine.index(documents, options);
  }

  invoke(query: string, options?: InvokeOptions): Promise<Document[]> {
    return this.engine.invoke(query, options);
  }

  deindex(options: DeindexOptions): Promise<void> {
    return this.engine.deindex(options);
  }
}
