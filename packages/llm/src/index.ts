export type { ChatModel, ChatModelFactory, CompleteOptions } from "./chat-model.interface.js";
export { OpenAIChatModel, createOpenAIChatModelFactory } from "./openai-chat-model.js";
export type { OpenAIChatModelConfig } from "./openai-chat-model.js";
export { TiktokenCounter, encodingForModel } from "./token-counter.js";
export type { TokenCounter } from "./token-counter.js";
export { CohereReranker } from "./reranker.js";
export type { Reranker, RerankResult, CohereRerankerConfig } from "./reranker.js";
