import { z } from "zod";
import type { StrategyId } from "@ragweave/types";

const positiveInt = z.number().int().positive();

const chunkingShape = {
  chunkSize: positiveInt.default(1500),
  chunkOverlap: z.number().int().nonnegative().default(50),
};

function overlapBelowSize(value: { chunkSize: number; chunkOverlap: number }): boolean {
  return value.chunkOverlap < value.chunkSize;
}

const OVERLAP_MESSAGE = { message: "chunkOverlap must be smaller than chunkSize" };

export const vanillaConfigSchema = z
  .object({
    ...chunkingShape,
    k: positiveInt.default(5),
  })
  .strict()
  .refine(overlapBelowSize, OVERLAP_MESSAGE);

export const rerankConfigSchema = z
  .object({
    ...chunkingShape,
    kRetrieve: positiveInt.default(35),
    kRerank: positiveInt.default(5),
  })
  .strict()
  .refine(overlapBelowSize, OVERLAP_MESSAGE)
  .refine((value) => value.kRerank <= value.kRetrieve, {
    message: "kRerank must not exceed kRetrieve",
  });

export const DEFAULT_INDEX_MODEL = "gpt-4o-mini";
export const DEFAULT_INDEX_TOKEN_LIMIT = 16_000;
export const DEFAULT_INVOKE_MODEL = "gpt-4o";
export const DEFAULT_MAX_ITERATIONS = 15;

// `indexModel` and `llmTokenLimit` stay optional here: a custom model without a
// token limit is a configuration error raised by the strategy itself.
export const agentConfigSchema = z
  .object({
    ...chunkingShape,
    k: positiveInt.default(5),
    chunkSizeSI: positiveInt.default(40_000),
    chunkOverlapSI: z.number().int().nonnegative().default(2_000),
    indexModel: z.string().min(1).optional(),
    llmTokenLimit: positiveInt.optional(),
    invokeModel: z.string().min(1).default(DEFAULT_INVOKE_MODEL),
    userTier: z.number().int().min(1).max(5).default(1),
    maxIterations: positiveInt.default(DEFAULT_MAX_ITERATIONS),
  })
  .strict()
  .refine(overlapBelowSize, OVERLAP_MESSAGE)
  .refine((value) => value.chunkOverlapSI < value.chunkSizeSI, {
    message: "chunkOverlapSI must be smaller than chunkSizeSI",
  });

export type VanillaConfig = Readonly<z.infer<typeof vanillaConfigSchema>>;
export type RerankConfig = Readonly<z.infer<typeof rerankConfigSchema>>;
export type AgentConfig = Readonly<z.infer<typeof agentConfigSchema>>;

export type VanillaConfigInput = z.input<typeof vanillaConfigSchema>;
export type RerankConfigInput = z.input<typeof rerankConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;

export interface StrategyConfigMap {
  "RAG-vanilla-v1": VanillaConfig;
  "RAG-rerank-v1-ch": RerankConfig;
  "ABM-router-v1-si": AgentConfig;
  "ABM-react-v1-si": AgentConfig;
}

export interface StrategyConfigInputMap {
  "RAG-vanilla-v1": VanillaConfigInput;
  "RAG-rerank-v1-ch": RerankConfigInput;
  "ABM-router-v1-si": AgentConfigInput;
  "ABM-react-v1-si": AgentConfigInput;
}

/**
 * Validate raw per-project configuration for a strategy and freeze the result.
 * Throws a ZodError when a field is unknown, mistyped or out of range.
 */
export function parseStrategyConfig<K extends StrategyId>(
  id: K,
  raw: unknown,
): StrategyConfigMap[K];
export function parseStrategyConfig(id: StrategyId, raw: unknown): StrategyConfigMap[StrategyId] {
  const input = raw ?? {};
  switch (id) {
    case "RAG-vanilla-v1":
      return Object.freeze(vanillaConfigSchema.parse(input));
    case "RAG-rerank-v1-ch":
      return Object.freeze(rerankConfigSchema.parse(input));
    case "ABM-router-v1-si":
    case "ABM-react-v1-si":
      return Object.freeze(agentConfigSchema.parse(input));
  }
}
