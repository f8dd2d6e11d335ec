import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "@ragweave/errors";
import { HashingEmbeddingProvider } from "@ragweave/embeddings/testing";
import type { Document } from "@ragweave/types";
import { InMemoryVectorStore, cosineSimilarity } from "./in-memory-store.js";
import { DEFAULT_NAMESPACE } from "./namespace.js";

function makeStore(isolation: "required" | "optional" = "required"): InMemoryVectorStore {
  return new InMemoryVectorStore({ embeddings: new HashingEmbeddingProvider(128), isolation });
}

function doc(content: string, metadata: Record<string, unknown> = {}): Document {
  return { content, metadata };
}

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is 0 when either vector is zero", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow("Vectors must have the same length");
  });
});

describe("InMemoryVectorStore", () => {
  it("returns one id per upserted document", async () => {
    const store = makeStore();

    const ids = await store.upsert([doc("first"), doc("second")], "u1");

    expect(ids).toHaveLength(2);
    expect(new Set(ids).size).toBe(2);
    expect(store.count("u1")).toBe(2);
  });

  it("ranks the best match first and bounds results by k", async () => {
    const store = makeStore();
    await store.upsert(
      [doc("cherry date"), doc("apple banana"), doc("apple pie recipe")],
      "u1",
    );

    const results = await store.similaritySearch("apple banana", { k: 2, namespace: "u1" });

    expect(results).toHaveLength(2);
    expect(results[0]?.content).toBe("apple banana");
    expect(results[0]?.score).toBeCloseTo(1);
  });

  it("never returns documents from another namespace", async () => {
    const store = makeStore();
    await store.upsert([doc("quarterly revenue report")], "tenant-a");

    const results = await store.similaritySearch("quarterly revenue report", {
      k: 5,
      namespace: "tenant-b",
    });

    expect(results).toEqual([]);
  });

  it("applies metadata filters", async () => {
    const store = makeStore();
    await store.upsert(
      [doc("alpha", { is_summary: true }), doc("alpha", { is_summary: false })],
      "u1",
    );

    const results = await store.similaritySearch("alpha", {
      k: 5,
      namespace: "u1",
      filter: { is_summary: false },
    });

    expect(results.map((result) => result.metadata)).toEqual([{ is_summary: false }]);
  });

  it("rejects a missing namespace when isolation is required", async () => {
    const store = makeStore("required");

    await expect(store.upsert([doc("x")])).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.similaritySearch("x", { k: 1 })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(store.delete({ deleteAll: true })).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("uses the default namespace when isolation is optional", async () => {
    const store = makeStore("optional");

    await store.upsert([doc("x")]);

    expect(store.count(DEFAULT_NAMESPACE)).toBe(1);
  });

  describe("delete", () => {
    it("deletes exactly the vectors matching a filter", async () => {
      const store = makeStore();
      const documents = Array.from({ length: 10 }, (_, i) =>
        doc(`section ${i} of the handbook`, { file_id: i < 3 ? "f1" : "f2" }),
      );
      await store.upsert(documents, "u1");

      await store.delete({ namespace: "u1", filter: { file_id: "f1" } });

      const remaining = await store.similaritySearch("section of the handbook", {
        k: 10,
        namespace: "u1",
      });
      expect(store.count("u1")).toBe(7);
      expect(remaining).toHaveLength(7);
      expect(remaining.every((result) => result.metadata["file_id"] === "f2")).toBe(true);
    });

    it("treats a filter without matches as a no-op", async () => {
      const store = makeStore();
      await store.upsert([doc("kept")], "u1");

      await expect(
        store.delete({ namespace: "u1", filter: { file_id: "missing" } }),
      ).resolves.toBeUndefined();
      expect(store.count("u1")).toBe(1);
    });

    it("deletes by id within the namespace only", async () => {
      const store = makeStore();
      const [idA] = await store.upsert([doc("shared")], "u1");
      await store.upsert([doc("shared")], "u2");

      await store.delete({ namespace: "u2", ids: [idA ?? ""] });
      expect(store.count("u1")).toBe(1);

      await store.delete({ namespace: "u1", ids: [idA ?? ""] });
      expect(store.count("u1")).toBe(0);
      expect(store.count("u2")).toBe(1);
    });

    it("clears one namespace with deleteAll", async () => {
      const store = makeStore();
      await store.upsert([doc("a"), doc("b")], "u1");
      await store.upsert([doc("c")], "u2");

      await store.delete({ namespace: "u1", deleteAll: true });

      expect(store.count("u1")).toBe(0);
      expect(store.count("u2")).toBe(1);
    });

    it("rejects a call with no ids, filter or deleteAll", async () => {
      const store = makeStore();

      await expect(store.delete({ namespace: "u1" })).rejects.toThrow(
        "Delete requires one of ids, deleteAll or filter",
      );
      await expect(store.delete({ namespace: "u1", ids: [] })).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
    });
  });
});
