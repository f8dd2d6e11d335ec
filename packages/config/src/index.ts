export { envSchema, parseEnv } from "./env.js";
export {
  assertCredentials,
  assertModelCredentials,
  MODEL_CREDENTIALS,
  RERANK_CREDENTIALS,
} from "./credentials.js";
export type { Env } from "./credentials.js";
export {
  vanillaConfigSchema,
  rerankConfigSchema,
  agentConfigSchema,
  parseStrategyConfig,
  DEFAULT_INDEX_MODEL,
  DEFAULT_INDEX_TOKEN_LIMIT,
  DEFAULT_INVOKE_MODEL,
  DEFAULT_MAX_ITERATIONS,
} from "./strategy-config.js";
export type {
  VanillaConfig,
  RerankConfig,
  AgentConfig,
  VanillaConfigInput,
  RerankConfigInput,
  AgentConfigInput,
  StrategyConfigMap,
  StrategyConfigInputMap,
} from "./strategy-config.js";
