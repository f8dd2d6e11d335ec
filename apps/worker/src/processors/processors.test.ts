import { describe, it, expect } from "vitest";
import { UnrecoverableError } from "bullmq";
import { HashingEmbeddingProvider } from "@ragweave/embeddings/testing";
import { ScriptedChatModel } from "@ragweave/llm/testing";
import {
  ConfigurationError,
  ExternalServiceError,
  InvalidArgumentError,
  RateLimitedError,
  UnknownStrategyError,
} from "@ragweave/errors";
import { createSilentLogger } from "@ragweave/logger";
import { createTestDependencies } from "@ragweave/strategies/testing";
import type { DeindexJobData, IndexJobData } from "@ragweave/types";
import { InMemoryVectorStore } from "@ragweave/vector-store";
import { processDeindexJob } from "./deindex-job.js";
import { processIndexJob } from "./index-job.js";
import { isFinalFailure, isPermanentFailure, runJob } from "./job-errors.js";

const logger = createSilentLogger();

function setup(models: Record<string, ScriptedChatModel> = {}) {
  const store = new InMemoryVectorStore({ embeddings: new HashingEmbeddingProvider(128) });
  return { store, deps: createTestDependencies({ store, models }) };
}

const indexJob: IndexJobData = {
  type: "index",
  namespace: "u1",
  strategyId: "RAG-vanilla-v1",
  strategyConfig: { k: 3 },
  documents: [
    { content: "first document", metadata: {} },
    { content: "second document", metadata: {} },
  ],
  metadata: { project_id: "p-1", file_id: "f-1" },
};

describe("processIndexJob", () => {
  it("indexes the job's documents through the requested strategy", async () => {
    const { store, deps } = setup();

    const result = await processIndexJob(indexJob, deps, logger);

    expect(result).toMatchObject({
      success: true,
      strategyId: "RAG-vanilla-v1",
      metrics: { documents: 2, chunks: 2, summaries: 0 },
    });
    expect(store.count("u1")).toBe(2);
  });

  it("replaces the writes of a failed attempt when the job is retried", async () => {
    const indexModel = new ScriptedChatModel([
      () => {
        throw new ExternalServiceError("upstream unavailable", "openai");
      },
      "Overview of the document.",
    ]);
    const { store, deps } = setup({ "gpt-4o-mini": indexModel });
    const job: IndexJobData = {
      ...indexJob,
      strategyId: "ABM-router-v1-si",
      strategyConfig: {},
      documents: [{ content: "quarterly figures", metadata: {} }],
    };

    const failure = await processIndexJob(job, deps, logger, 0).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(ExternalServiceError);
    expect(isPermanentFailure(failure)).toBe(false);
    expect(store.count("u1")).toBe(1);

    const result = await processIndexJob(job, deps, logger, 1);

    expect(result.metrics).toEqual({ documents: 1, chunks: 1, summaries: 1 });
    expect(store.count("u1")).toBe(2);
  });

  it("rejects an unknown strategy", async () => {
    const { deps } = setup();

    await expect(processIndexJob({ ...indexJob, strategyId: "nope" }, deps, logger)).rejects.toBeInstanceOf(
      UnknownStrategyError,
    );
  });
});

describe("processDeindexJob", () => {
  it("removes the filtered documents from the namespace", async () => {
    const { store, deps } = setup();
    await processIndexJob(indexJob, deps, logger);
    await processIndexJob({ ...indexJob, metadata: { file_id: "f-2" } }, deps, logger);

    const job: DeindexJobData = {
      type: "deindex",
      namespace: "u1",
      strategyId: "RAG-vanilla-v1",
      strategyConfig: {},
      filter: { file_id: "f-1" },
    };
    const result = await processDeindexJob(job, deps, logger);

    expect(result.success).toBe(true);
    expect(store.count("u1")).toBe(2);
  });
});

describe("job errors", () => {
  it("classifies input and configuration errors as permanent", () => {
    expect(isPermanentFailure(new InvalidArgumentError())).toBe(true);
    expect(isPermanentFailure(new UnknownStrategyError("x"))).toBe(true);
    expect(isPermanentFailure(new ConfigurationError())).toBe(true);
    expect(isPermanentFailure(new RateLimitedError())).toBe(false);
    expect(isPermanentFailure(new ExternalServiceError("down", "qdrant"))).toBe(false);
    expect(isPermanentFailure(new Error("network"))).toBe(false);
  });

  it("wraps permanent failures in UnrecoverableError", async () => {
    await expect(
      runJob(async () => {
        throw new InvalidArgumentError("bad job");
      }),
    ).rejects.toBeInstanceOf(UnrecoverableError);

    await expect(
      runJob(async () => {
        throw new RateLimitedError();
      }),
    ).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("detects the last failed attempt", () => {
    expect(isFinalFailure({ attemptsMade: 3, opts: { attempts: 3 } }, new Error("x"))).toBe(true);
    expect(isFinalFailure({ attemptsMade: 1, opts: { attempts: 3 } }, new Error("x"))).toBe(false);
    expect(isFinalFailure({ attemptsMade: 1, opts: { attempts: 3 } }, new UnrecoverableError("x"))).toBe(true);
  });
});
