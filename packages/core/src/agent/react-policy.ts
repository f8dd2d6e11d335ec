import type { ChatModel } from "@ragweave/llm";
import { formatPrompt } from "../prompts.js";
import { renderScratchpad, renderToolNames, renderTools } from "./render.js";
import type { AgentDecision, AgentPolicy } from "./types.js";

export const REACT_STOP = ["\nObservation"];

const FINAL_ANSWER = "Final Answer:";
const ACTION_PATTERN = /Action\s*\d*\s*:[\s]*(.*?)[\s]*Action\s*\d*\s*Input\s*\d*\s*:[\s]*(.*)/s;

/** Read one ReAct completion: a tool call, a final answer or a format error. */
export function parseReactOutput(text: string): AgentDecision {
  const action = ACTION_PATTERN.exec(text);
  const hasFinal = text.includes(FINAL_ANSWER);

  if (action && hasFinal) {
    return {
      type: "invalid",
      log: text,
      observation: "Invalid Format: reply contains both an action and a final answer.",
    };
  }

  if (hasFinal) {
    const answer = text.slice(text.lastIndexOf(FINAL_ANSWER) + FINAL_ANSWER.length).trim();
    return { type: "finish", answer, log: text };
  }

  if (action) {
    const tool = (action[1] ?? "").trim();
    const toolInput = (action[2] ?? "").trim().replace(/^"(.*)"$/s, "$1");
    return { type: "tool", tool, toolInput, log: text };
  }

  const observation = /Action\s*\d*\s*:/.test(text)
    ? "Invalid Format: Missing 'Action Input:' after 'Action:'"
    : "Invalid Format: Missing 'Action:' after 'Thought:'";
  return { type: "invalid", log: text, observation };
}

/**
 * Thought / Action / Observation loop. Parse errors and unknown tools are fed
 * back as observations; `Final Answer:` ends the run.
 */
export function createReactPolicy(llm: ChatModel, template: string): AgentPolicy {
  return {
    name: "react",
    stopAfterTool: false,
    async decide(question, tools, steps, run) {
      const prompt = formatPrompt(template, {
        tools: renderTools(tools),
        tool_names: renderToolNames(tools),
        input: question,
        agent_scratchpad: renderScratchpad(steps),
      });
      const reply = await llm.complete(prompt, { stop: REACT_STOP, observer: run.trace, name: "react-step" });
      return parseReactOutput(reply);
    },
  };
}
