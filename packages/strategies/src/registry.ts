import { ZodError } from "zod";
import { parseStrategyConfig } from "@ragweave/config";
import { InvalidArgumentError, UnknownStrategyError } from "@ragweave/errors";
import { STRATEGY_IDS } from "@ragweave/types";
import type { RetrievalStrategy, StrategyId } from "@ragweave/types";
import type { StrategyDependencies } from "./dependencies.js";
import { ReActAgentRAG } from "./react-agent.js";
import { RerankRAG } from "./rerank.js";
import { RouterAgentRAG } from "./router-agent.js";
import { VanillaRAG } from "./vanilla.js";

const KNOWN_IDS = new Set<string>(STRATEGY_IDS);

export function isStrategyId(value: string): value is StrategyId {
  return KNOWN_IDS.has(value);
}

function parseConfig<K extends StrategyId>(id: K, rawConfig: unknown) {
  try {
    return parseStrategyConfig(id, rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new InvalidArgumentError(`Invalid configuration for ${id}`, {
        details: { issues: error.issues },
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Build a strategy from its identifier and raw per-project configuration.
 *
 * @throws UnknownStrategyError for an unregistered identifier
 * @throws InvalidArgumentError when the configuration fails validation
 * @throws ConfigurationError when a required credential is missing
 */
export function createStrategy(
  id: string,
  rawConfig: unknown,
  deps: StrategyDependencies,
): RetrievalStrategy {
  if (!isStrategyId(id)) {
    throw new UnknownStrategyError(id);
  }

  switch (id) {
    case "RAG-vanilla-v1":
      return new VanillaRAG(parseConfig(id, rawConfig), deps);
    case "RAG-rerank-v1-ch":
      return new RerankRAG(parseConfig(id, rawConfig), deps);
    case "ABM-router-v1-si":
      return new RouterAgentRAG(parseConfig(id, rawConfig), deps);
    case "ABM-react-v1-si":
      return new ReActAgentRAG(parseConfig(id, rawConfig), deps);
    default: {
      const unreachable: never = id;
      throw new UnknownStrategyError(String(unreachable));
    }
  }
}
