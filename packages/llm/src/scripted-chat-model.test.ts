import { describe, it, expect } from "vitest";
import * as llm from "./index.js";
import { ScriptedChatModel } from "./scripted-chat-model.js";
import * as testing from "./testing.js";

describe("ScriptedChatModel", () => {
  it("replays replies in order and repeats the last", async () => {
    const model = new ScriptedChatModel(["one", (prompt) => `echo ${prompt}`]);

    expect(await model.complete("a")).toBe("one");
    expect(await model.complete("b")).toBe("echo b");
    expect(await model.complete("c")).toBe("echo c");
    expect(model.prompts).toEqual(["a", "b", "c"]);
  });

  it("records stop sequences", async () => {
    const model = new ScriptedChatModel(["x"]);

    await model.complete("p", { stop: ["\nObservation"] });

    expect(model.calls).toEqual([{ prompt: "p", stop: ["\nObservation"] }]);
  });

  it("is only reachable from the testing entry point", () => {
    expect(Object.keys(llm)).not.toContain("ScriptedChatModel");
    expect(testing.ScriptedChatModel).toBe(ScriptedChatModel);
  });
});
