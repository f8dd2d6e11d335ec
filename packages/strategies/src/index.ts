export { createStrategy, isStrategyId } from "./registry.js";
export { createStrategyDependencies } from "./dependencies.js";
export type { StrategyDependencies, CreateDependenciesOptions } from "./dependencies.js";
export { VanillaRAG } from "./vanilla.js";
export { RerankRAG } from "./rerank.js";
export { RouterAgentRAG } from "./router-agent.js";
export { ReActAgentRAG } from "./react-agent.js";
export { AgentRetrieval, resolveIndexModel } from "./agent-retrieval.js";
export type { IndexModel, PolicyFactory } from "./agent-retrieval.js";
export { StrategyRuntime, emptyAcknowledgement } from "./runtime.js";
