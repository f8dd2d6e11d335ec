import { DEFAULT_MAX_ITERATIONS } from "@ragweave/config";
import { AgentBudgetExceededError } from "@ragweave/errors";
import { createSilentLogger, type Logger } from "@ragweave/logger";
import type { Document } from "@ragweave/types";
import { formatDocuments } from "../context-assembler.js";
import { NOOP_RUN, type RunContext } from "../pipeline.js";
import type { AgentPolicy, AgentResult, AgentState, AgentStep, AgentTool } from "./types.js";

export interface AgentControllerOptions {
  policy: AgentPolicy;
  tools: readonly AgentTool[];
  /** Tool selections allowed before the run fails. */
  maxIterations?: number;
  logger?: Logger;
}

function uniqueDocuments(steps: readonly AgentStep[]): Document[] {
  const seen = new Set<string>();
  const documents: Document[] = [];
  for (const step of steps) {
    for (const document of step.documents) {
      const key = document.id ?? `content:${document.content}`;
      if (seen.has(key)) continue;
      seen.add(key);
      documents.push(document);
    }
  }
  return documents;
}

/**
 * Bounded tool-using loop:
 *
 *   Start → ToolSelection → ToolExecution → (ToolSelection | FinalAnswer)
 *
 * Every ToolSelection counts against `maxIterations`; running out raises
 * AgentBudgetExceededError. Any error moves the run to Aborted and propagates.
 */
export class AgentController {
  private readonly policy: AgentPolicy;
  private readonly tools: readonly AgentTool[];
  private readonly toolsByName: ReadonlyMap<string, AgentTool>;
  private readonly maxIterations: number;
  private readonly logger: Logger;

  constructor(options: AgentControllerOptions) {
    this.policy = options.policy;
    this.tools = options.tools;
    this.toolsByName = new Map(options.tools.map((tool) => [tool.name, tool]));
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(question: string, run: RunContext = NOOP_RUN): Promise<AgentResult> {
    const transitions: AgentState[] = ["Start"];
    const steps: AgentStep[] = [];
    const move = (next: AgentState): void => {
      this.logger.debug({ from: transitions[transitions.length - 1], to: next }, "Agent transition");
      transitions.push(next);
    };
    const finish = (answer: string): AgentResult => {
      move("FinalAnswer");
      return { answer, documents: uniqueDocuments(steps), steps, state: "FinalAnswer", transitions };
    };

    try {
      for (let iteration = 0; iteration < this.maxIterations; iteration++) {
        move("ToolSelection");
        const decision = await this.policy.decide(question, this.tools, steps, run);

        if (decision.type === "finish") return finish(decision.answer);

        if (decision.type === "invalid") {
          steps.push({
            tool: "_invalid",
            toolInput: "",
            log: decision.log,
            observation: decision.observation,
            documents: [],
          });
          continue;
        }

        move("ToolExecution");
        const tool = this.toolsByName.get(decision.tool);
        if (!tool) {
          steps.push({
            tool: decision.tool,
            toolInput: decision.toolInput,
            log: decision.log,
            observation: `${decision.tool} is not a valid tool, try one of [${this.toolNames()}].`,
            documents: [],
          });
          continue;
        }

        const documents = await tool.run(decision.toolInput, run);
        const observation = formatDocuments(documents);
        steps.push({ tool: tool.name, toolInput: decision.toolInput, log: decision.log, observation, documents });

        if (this.policy.stopAfterTool) return finish(observation);
      }

      throw new AgentBudgetExceededError(this.maxIterations);
    } catch (error) {
      move("Aborted");
      this.logger.warn({ err: error, policy: this.policy.name, steps: steps.length }, "Agent run aborted");
      throw error;
    }
  }

  private toolNames(): string {
    return this.tools.map((tool) => tool.name).join(", ");
  }
}
