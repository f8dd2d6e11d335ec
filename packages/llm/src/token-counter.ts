import { getEncoding } from "js-tiktoken";
import type { Tiktoken } from "js-tiktoken";

export interface TokenCounter {
  count(text: string): number;
}

const O200K_PREFIXES = ["gpt-4o", "gpt-4.1", "gpt-5", "o1", "o3", "o4", "chatgpt-4o"];

export function encodingForModel(modelName: string): "o200k_base" | "cl100k_base" {
  return O200K_PREFIXES.some((prefix) => modelName.startsWith(prefix))
    ? "o200k_base"
    : "cl100k_base";
}

const encoders = new Map<string, Tiktoken>();

/** Counts tokens with the BPE encoding the target model uses. */
export class TiktokenCounter implements TokenCounter {
  private encoder: Tiktoken;

  constructor(modelName: string) {
    const encoding = encodingForModel(modelName);
    let encoder = encoders.get(encoding);
    if (!encoder) {
      encoder = getEncoding(encoding);
      encoders.set(encoding, encoder);
    }
    this.encoder = encoder;
  }

  count(text: string): number {
    return this.encoder.encode(text).length;
  }
}
