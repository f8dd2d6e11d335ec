import type { Document } from "@ragweave/types";
import type { RunContext } from "../pipeline.js";

export type AgentState = "Start" | "ToolSelection" | "ToolExecution" | "FinalAnswer" | "Aborted";

export interface AgentTool {
  readonly name: string;
  readonly description: string;
  run(input: string, run: RunContext): Promise<Document[]>;
}

export type AgentDecision =
  | { type: "tool"; tool: string; toolInput: string; log: string }
  | { type: "finish"; answer: string; log: string }
  /** Reply the policy could not act on; the observation is fed back to the model. */
  | { type: "invalid"; observation: string; log: string };

export interface AgentStep {
  tool: string;
  toolInput: string;
  log: string;
  observation: string;
  documents: Document[];
}

export interface AgentPolicy {
  readonly name: string;
  /** End the run with the first tool observation as the answer. */
  readonly stopAfterTool: boolean;
  decide(
    question: string,
    tools: readonly AgentTool[],
    steps: readonly AgentStep[],
    run: RunContext,
  ): Promise<AgentDecision>;
}

export interface AgentResult {
  answer: string;
  /** Retrieved documents in order of first retrieval, without duplicates. */
  documents: Document[];
  steps: AgentStep[];
  state: "FinalAnswer";
  transitions: AgentState[];
}
