import { describe, it, expect } from "vitest";
import { HashingEmbeddingProvider } from "@ragweave/embeddings/testing";
import { InMemoryVectorStore } from "@ragweave/vector-store";
import { NOOP_RUN } from "../pipeline.js";
import { CHUNK_RETRIEVER_NAME, SUMMARY_RETRIEVER_NAME, createRetrieverTools } from "./tools.js";

async function seededStore(): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore({ embeddings: new HashingEmbeddingProvider(64) });
  await store.upsert(
    [
      { content: "quarterly revenue grew", metadata: { is_summary: false, file_id: "f-1" } },
      { content: "report about revenue", metadata: { is_summary: true, file_id: "f-1" } },
      { content: "revenue in another file", metadata: { is_summary: false, file_id: "f-2" } },
    ],
    "u1",
  );
  await store.upsert([{ content: "revenue of another tenant", metadata: { is_summary: false } }], "u2");
  return store;
}

describe("createRetrieverTools", () => {
  it("scopes each tool to its discriminator and the namespace", async () => {
    const store = await seededStore();
    const [chunks, summaries] = createRetrieverTools({
      store,
      k: 5,
      namespace: "u1",
      chunkDescription: "chunks",
      summaryDescription: "summaries",
    });

    expect(chunks?.name).toBe(CHUNK_RETRIEVER_NAME);
    expect(summaries?.name).toBe(SUMMARY_RETRIEVER_NAME);

    const chunkHits = (await chunks?.run("revenue", NOOP_RUN)) ?? [];
    const summaryHits = (await summaries?.run("revenue", NOOP_RUN)) ?? [];

    expect(chunkHits.map((d) => d.content).sort()).toEqual([
      "quarterly revenue grew",
      "revenue in another file",
    ]);
    expect(summaryHits.map((d) => d.content)).toEqual(["report about revenue"]);
  });

  it("applies caller filters without letting them override the scope", async () => {
    const store = await seededStore();
    const [chunks] = createRetrieverTools({
      store,
      k: 5,
      namespace: "u1",
      filters: { file_id: "f-2", is_summary: true },
      chunkDescription: "chunks",
      summaryDescription: "summaries",
    });

    const hits = (await chunks?.run("revenue", NOOP_RUN)) ?? [];

    expect(hits.map((d) => d.content)).toEqual(["revenue in another file"]);
  });
});
