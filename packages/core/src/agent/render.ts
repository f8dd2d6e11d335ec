import type { AgentStep, AgentTool } from "./types.js";

export function renderTools(tools: readonly AgentTool[]): string {
  return tools.map((tool) => `${tool.name}: ${tool.description}`).join("\n");
}

export function renderToolNames(tools: readonly AgentTool[]): string {
  return tools.map((tool) => tool.name).join(", ");
}

/** Prior steps as ReAct text: each step's log, its observation, then a fresh thought. */
export function renderScratchpad(steps: readonly AgentStep[]): string {
  return steps.map((step) => `${step.log}\nObservation: ${step.observation}\nThought: `).join("");
}
