export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  UnknownStrategyError,
  InvalidArgumentError,
  RateLimitedError,
  AgentBudgetExceededError,
  ExternalServiceError,
} from "./errors.js";

export { toProviderError } from "./provider-error.js";

export { withRetry, sleep } from "./retry.js";
export type { RetryOptions } from "./retry.js";
