import type { ChatModel } from "@ragweave/llm";
import { formatPrompt } from "../prompts.js";
import { renderToolNames, renderTools } from "./render.js";
import type { AgentDecision, AgentPolicy, AgentStep, AgentTool } from "./types.js";

function normalizeName(name: string): string {
  return name
    .trim()
    .replace(/^["'`]+|["'`.]+$/g, "")
    .trim()
    .toLowerCase();
}

function feedbackFor(steps: readonly AgentStep[]): string {
  const rejected = steps.map((step) => `"${step.log}"`);
  return rejected.length === 0
    ? ""
    : `Previous replies that were not retriever names: ${rejected.join(", ")}.\n`;
}

/**
 * One routing decision: the model names a retriever, the question goes to it
 * unchanged and its results are the answer.
 */
export function createRouterPolicy(llm: ChatModel, template: string): AgentPolicy {
  return {
    name: "router",
    stopAfterTool: true,
    async decide(question, tools: readonly AgentTool[], steps, run): Promise<AgentDecision> {
      const prompt = formatPrompt(template, {
        tools: renderTools(tools),
        tool_names: renderToolNames(tools),
        feedback: feedbackFor(steps),
        input: question,
      });
      const reply = await llm.complete(prompt, { observer: run.trace, name: "route" });
      const choice = tools.find((tool) => normalizeName(tool.name) === normalizeName(reply));

      if (!choice) {
        return {
          type: "invalid",
          log: reply.trim(),
          observation: `"${reply.trim()}" is not one of [${renderToolNames(tools)}].`,
        };
      }
      return { type: "tool", tool: choice.name, toolInput: question, log: reply.trim() };
    },
  };
}
