import type { ChatModel, CompleteOptions } from "./chat-model.interface.js";

export type ScriptedReply = string | ((prompt: string) => string);

/**
 * In-process chat model replaying canned replies in order. The last reply is
 * repeated once the script runs out. Records every prompt it receives.
 */
export class ScriptedChatModel implements ChatModel {
  readonly modelName: string;
  readonly prompts: string[] = [];
  readonly calls: { prompt: string; stop?: string[] }[] = [];
  private replies: ScriptedReply[];

  constructor(replies: ScriptedReply[], modelName = "scripted") {
    this.replies = replies;
    this.modelName = modelName;
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.calls.push({ prompt, stop: options.stop });

    const reply = this.replies[Math.min(this.prompts.length - 1, this.replies.length - 1)];
    if (reply === undefined) {
      throw new Error("ScriptedChatModel has no replies");
    }
    return typeof reply === "string" ? reply : reply(prompt);
  }
}
