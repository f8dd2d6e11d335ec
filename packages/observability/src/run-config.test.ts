import { describe, it, expect } from "vitest";
import { buildRunConfig, runTraced } from "./run-config.js";
import { createRecordingTracer } from "./recording-tracer.js";

describe("buildRunConfig", () => {
  it("names the run after the strategy and method", () => {
    expect(buildRunConfig("ABM-react-v1-si", "invoke", "u1")).toEqual({
      runName: "[ABM-react-v1-si]-invoke",
      tags: ["ABM-react-v1-si"],
      metadata: { instance_id: "ABM-react-v1-si", user_id: "u1", method: "invoke" },
    });
  });

  it("records a missing caller as null", () => {
    expect(buildRunConfig("RAG-vanilla-v1", "deindex").metadata.user_id).toBeNull();
  });
});

describe("runTraced", () => {
  it("opens one trace, records the output and ends it", async () => {
    const tracer = createRecordingTracer();
    const config = buildRunConfig("RAG-vanilla-v1", "index", "u1");

    const result = await runTraced(tracer, config, { documents: 2 }, async (trace) => {
      trace.span({ name: "chunk" }).end();
      return 7;
    });

    expect(result).toBe(7);
    expect(tracer.traces).toHaveLength(1);
    const [trace] = tracer.traces;
    expect(trace?.name).toBe("[RAG-vanilla-v1]-index");
    expect(trace?.tags).toEqual(["RAG-vanilla-v1"]);
    expect(trace?.input).toEqual({ documents: 2 });
    expect(trace?.updates).toEqual([{ output: 7 }]);
    expect(trace?.ended).toBe(true);
    expect(trace?.children.map((child) => child.name)).toEqual(["chunk"]);
  });

  it("records the error, ends the trace and rethrows", async () => {
    const tracer = createRecordingTracer();
    const config = buildRunConfig("RAG-vanilla-v1", "invoke", "u1");

    await expect(
      runTraced(tracer, config, "query", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(tracer.traces[0]?.updates).toEqual([{ metadata: { error: "boom" } }]);
    expect(tracer.traces[0]?.ended).toBe(true);
  });
});
