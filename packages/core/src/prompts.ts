import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { InvalidArgumentError } from "@ragweave/errors";

export interface PromptSet {
  readonly summarize: string;
  readonly summarizeShort: string;
  readonly react: string;
  readonly router: string;
  readonly chunkRetrieverDescription: string;
  readonly summaryRetrieverDescription: string;
}

export const DEFAULT_PROMPT_DIR = fileURLToPath(new URL("../prompts/", import.meta.url));

const PROMPT_FILES = {
  summarize: "summarize.md",
  summarizeShort: "summarize_short.md",
  react: "react.md",
  router: "router.md",
  chunkRetrieverDescription: join("descriptions", "chunk_retriever.md"),
  summaryRetrieverDescription: join("descriptions", "summary_retriever.md"),
} satisfies Record<keyof PromptSet, string>;

/** Read every prompt template once. */
export function loadPromptSet(dir: string = DEFAULT_PROMPT_DIR): PromptSet {
  const read = (file: string): string => readFileSync(join(dir, file), "utf8").trim();

  return Object.freeze({
    summarize: read(PROMPT_FILES.summarize),
    summarizeShort: read(PROMPT_FILES.summarizeShort),
    react: read(PROMPT_FILES.react),
    router: read(PROMPT_FILES.router),
    chunkRetrieverDescription: read(PROMPT_FILES.chunkRetrieverDescription),
    summaryRetrieverDescription: read(PROMPT_FILES.summaryRetrieverDescription),
  });
}

/**
 * Substitute `{name}` placeholders. Every placeholder must have a value; text
 * inserted by a substitution is not scanned again.
 */
export function formatPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (_match, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new InvalidArgumentError(`Missing prompt variable: ${name}`);
    }
    return value;
  });
}
