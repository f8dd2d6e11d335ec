import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExternalServiceError, RateLimitedError } from "@ragweave/errors";
import { createRecordingTracer } from "@ragweave/observability/testing";

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock("openai", () => ({
  default: vi.fn(() => ({ chat: { completions: { create: mockCreate } } })),
}));

import { OpenAIChatModel, createOpenAIChatModelFactory } from "./openai-chat-model.js";

describe("OpenAIChatModel", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends one user message at temperature 0 and returns the reply text", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: "A short summary." } }],
      usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
    });
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o-mini" });

    await expect(model.complete("Summarize this")).resolves.toBe("A short summary.");
    expect(mockCreate).toHaveBeenCalledWith({
      model: "gpt-4o-mini",
      messages: [{ role: "user", content: "Summarize this" }],
      temperature: 0,
    });
  });

  it("passes stop sequences", async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: "Thought:" } }] });
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o" });

    await model.complete("prompt", { stop: ["\nObservation"] });

    expect(mockCreate.mock.calls[0]?.[0]).toMatchObject({ stop: ["\nObservation"] });
  });

  it("returns an empty string when the reply has no content", async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o" });

    await expect(model.complete("prompt")).resolves.toBe("");
  });

  it("records a generation with token usage", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: "ok" } }],
      usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
    });
    const tracer = createRecordingTracer();
    const trace = tracer.trace({ name: "run" });
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o" });

    await model.complete("prompt", { observer: trace, name: "summarize" });

    const generation = tracer.traces[0]?.children[0];
    expect(generation?.kind).toBe("generation");
    expect(generation?.name).toBe("summarize");
    expect(generation?.updates).toEqual([
      { output: "ok", usage: { input: 3, output: 1, total: 4 } },
    ]);
    expect(generation?.ended).toBe(true);
  });

  it("maps 429 responses to RateLimitedError", async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error("Rate limit"), { status: 429 }));
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o" });

    await expect(model.complete("prompt")).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("maps other failures to ExternalServiceError", async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error("Unavailable"), { status: 503 }));
    const model = new OpenAIChatModel({ apiKey: "test-key", model: "gpt-4o" });

    await expect(model.complete("prompt")).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("factory builds models by name", () => {
    const factory = createOpenAIChatModelFactory("test-key");

    expect(factory("gpt-4o-mini").modelName).toBe("gpt-4o-mini");
  });
});
