import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "@ragweave/errors";
import { HashingEmbeddingProvider } from "@ragweave/embeddings/testing";
import { createRecordingTracer } from "@ragweave/observability/testing";
import { InMemoryVectorStore } from "@ragweave/vector-store";
import { createTestDependencies } from "./testing.js";
import { VanillaRAG } from "./vanilla.js";

const CONFIG = Object.freeze({ chunkSize: 1500, chunkOverlap: 50, k: 1 });

const SENTENCE = "The harbor lighthouse keeps a log of every passing ship. ";
const FIVE_HUNDRED = SENTENCE.repeat(9).slice(0, 500).trim();

function setup() {
  const store = new InMemoryVectorStore({ embeddings: new HashingEmbeddingProvider(256) });
  const tracer = createRecordingTracer();
  const deps = createTestDependencies({ store, tracer });
  return { store, tracer, strategy: new VanillaRAG(CONFIG, deps) };
}

describe("VanillaRAG", () => {
  it("indexes, retrieves and deindexes a single document", async () => {
    const { strategy } = setup();
    expect(FIVE_HUNDRED.length).toBeGreaterThan(490);

    const ack = await strategy.index(
      [{ content: FIVE_HUNDRED, metadata: { file_title: "harbor.txt" } }],
      { namespace: "u1", metadata: { project_id: "p-1", file_id: "f-1" } },
    );
    expect(ack.documents).toBe(1);
    expect(ack.chunkIds).toHaveLength(1);

    const results = await strategy.invoke("representative phrase from the document", {
      namespace: "u1",
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.content).toBe(FIVE_HUNDRED);
    expect(results[0]?.id).toBe(ack.chunkIds[0]);
    expect(results[0]?.metadata).toEqual({
      file_title: "harbor.txt",
      project_id: "p-1",
      file_id: "f-1",
      user_id: "u1",
      is_summary: false,
    });

    await strategy.deindex({ ids: [results[0]?.id ?? ""], namespace: "u1" });

    await expect(
      strategy.invoke("representative phrase from the document", { namespace: "u1" }),
    ).resolves.toEqual([]);
  });

  it("never returns documents from another namespace", async () => {
    const { strategy } = setup();
    await strategy.index([{ content: "tenant one secret plan", metadata: {} }], { namespace: "u1" });

    await expect(strategy.invoke("tenant one secret plan", { namespace: "u2" })).resolves.toEqual([]);
  });

  it("ignores reserved keys set through user metadata", async () => {
    const { strategy } = setup();

    await strategy.index(
      [{ content: "budget notes", metadata: { user_id: "intruder", project_id: "evil", tag: "x" } }],
      { namespace: "u1", metadata: { project_id: "p-1" } },
    );
    const [result] = await strategy.invoke("budget notes", { namespace: "u1" });

    expect(result?.metadata).toEqual({ tag: "x", project_id: "p-1", user_id: "u1", is_summary: false });
  });

  it("strips reserved values that do not match the caller on the way out", async () => {
    const { store, strategy } = setup();
    await store.upsert([{ content: "planted", metadata: { user_id: "intruder", project_id: "p-9" } }], "u1");

    const [result] = await strategy.invoke("planted", {
      namespace: "u1",
      filters: { project_id: "p-9" },
    });

    expect(result?.metadata).toEqual({ project_id: "p-9" });
  });

  it("treats index([]) as a no-op", async () => {
    const { store, strategy } = setup();

    await expect(strategy.index([], { namespace: "u1" })).resolves.toEqual({
      documents: 0,
      chunkIds: [],
      summaryIds: [],
    });
    expect(store.count("u1")).toBe(0);
  });

  it("rejects an empty query", async () => {
    const { strategy } = setup();

    await expect(strategy.invoke("   ", { namespace: "u1" })).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("rejects calls without a namespace", async () => {
    const { strategy } = setup();

    await expect(strategy.invoke("query")).rejects.toThrow("A namespace is required for vector-store operations");
  });

  it("rejects deindex without ids, deleteAll or filter", async () => {
    const { strategy } = setup();

    await expect(strategy.deindex({ namespace: "u1" })).rejects.toThrow(
      "Delete requires one of ids, deleteAll or filter",
    );
  });

  it("deindexes by filter within the namespace", async () => {
    const { store, strategy } = setup();
    await strategy.index([{ content: "first file", metadata: {} }], {
      namespace: "u1",
      metadata: { file_id: "f-1" },
    });
    await strategy.index([{ content: "second file", metadata: {} }], {
      namespace: "u1",
      metadata: { file_id: "f-2" },
    });

    await strategy.deindex({ namespace: "u1", filter: { file_id: "f-1" } });

    expect(store.count("u1")).toBe(1);
  });

  it("opens one trace per call named after the strategy and method", async () => {
    const { tracer, strategy } = setup();

    await strategy.invoke("anything", { namespace: "u1" });

    const [trace] = tracer.traces;
    expect(trace?.name).toBe("[RAG-vanilla-v1]-invoke");
    expect(trace?.tags).toEqual(["RAG-vanilla-v1"]);
    expect(trace?.metadata).toEqual({ instance_id: "RAG-vanilla-v1", user_id: "u1", method: "invoke" });
    expect(trace?.children.map((span) => span.name)).toEqual(["retrieve", "present"]);
    expect(trace?.ended).toBe(true);
  });
});
