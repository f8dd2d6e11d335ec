import type { AgentConfig } from "@ragweave/config";
import { createReactPolicy } from "@ragweave/core";
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
 * `ABM-react-v1-si`: indexes like the router strategy; on invoke a ReAct agent
 * may query both retrievers several times before it answers.
 */
export class ReActAgentRAG implements RetrievalStrategy {
  readonly id = "ABM-react-v1-si";
  private readonly engine: AgentRetrieval;

  constructor(config: AgentConfig, deps: StrategyDependencies) {
    this.engine = new AgentRetrieval(this.id, config, deps, (llm, prompts) =>
      createReactPolicy(llm, prompts.react),
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
