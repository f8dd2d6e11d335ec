import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * A required credential or setting is missing. Raised while constructing a
 * component, never retried.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
  }
}

export class UnknownStrategyError extends AppError {
  public readonly strategyId: string;

  constructor(strategyId: string, options?: ErrorExtras) {
    super({
      message: `Unknown strategy: ${strategyId}`,
      statusCode: 404,
      code: "UNKNOWN_STRATEGY",
      ...options,
    });
    this.strategyId = strategyId;
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message = "Invalid argument", options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_ARGUMENT",
      ...options,
    });
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the provider asked us to wait, when known. */
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter = 60, options?: ErrorExtras) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      ...options,
    });
    this.retryAfter = retryAfter;
  }

  static isRateLimited(err: unknown): err is RateLimitedError {
    return err instanceof RateLimitedError;
  }
}

export class AgentBudgetExceededError extends AppError {
  public readonly maxIterations: number;

  constructor(maxIterations: number, options?: ErrorExtras) {
    super({
      message: `Agent did not reach a final answer within ${String(maxIterations)} iterations`,
      statusCode: 422,
      code: "AGENT_BUDGET_EXCEEDED",
      ...options,
    });
    this.maxIterations = maxIterations;
  }
}

/**
 * Non-rate-limit failure of an embedding, completion, rerank or vector-store call.
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      ...options,
    });
    this.service = service;
  }
}
