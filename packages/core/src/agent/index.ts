export { AgentController } from "./controller.js";
export type { AgentControllerOptions } from "./controller.js";
export { createRouterPolicy } from "./router-policy.js";
export { createReactPolicy, parseReactOutput, REACT_STOP } from "./react-policy.js";
export {
  createRetrieverTool,
  createRetrieverTools,
  CHUNK_RETRIEVER_NAME,
  SUMMARY_RETRIEVER_NAME,
} from "./tools.js";
export type { RetrieverToolOptions, RetrieverToolsetOptions } from "./tools.js";
export type {
  AgentState,
  AgentTool,
  AgentDecision,
  AgentStep,
  AgentPolicy,
  AgentResult,
} from "./types.js";
