import type { Document } from "@ragweave/types";
import { InvalidArgumentError } from "@ragweave/errors";
import type { ChunkerOptions, IChunker } from "./chunker.interface.js";

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", " ", ""];

/**
 * Character-bounded recursive splitter.
 *
 * Splits on the first separator of the hierarchy that occurs in the text, keeping
 * the separator at the start of the following piece, then merges pieces up to
 * `chunkSize` characters. Pieces that are still too long are split again with the
 * remaining separators. Consecutive chunks share up to `chunkOverlap` characters
 * of whole pieces.
 */
export class RecursiveCharacterSplitter implements IChunker {
  readonly strategy = "recursive";
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: readonly string[];

  constructor(options: ChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new InvalidArgumentError(
        `chunkOverlap (${options.chunkOverlap}) must be in [0, chunkSize (${options.chunkSize}))`,
      );
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  splitDocuments(documents: readonly Document[]): Document[] {
    return documents.flatMap((document) =>
      this.splitText(document.content).map((content) => ({
        content,
        metadata: { ...document.metadata },
      })),
    );
  }

  private split(text: string, separators: readonly string[]): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: readonly string[] = [];

    for (const [i, candidate] of separators.entries()) {
      if (candidate === "") {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending));
        pending = [];
      }

      if (remaining.length === 0) {
        const trimmed = piece.trim();
        if (trimmed.length > 0) chunks.push(trimmed);
      } else {
        chunks.push(...this.split(piece, remaining));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending));
    }

    return chunks;
  }

  // Pieces already carry their separators, so they are joined with "".
  private merge(pieces: readonly string[]): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > this.chunkSize && current.length > 0) {
        pushJoined(chunks, current);

        while (total > this.chunkOverlap || (total + piece.length > this.chunkSize && total > 0)) {
          const dropped = current.shift();
          if (dropped === undefined) break;
          total -= dropped.length;
        }
      }

      current.push(piece);
      total += piece.length;
    }

    pushJoined(chunks, current);
    return chunks;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    return Array.from(text);
  }

  return text
    .split(separator)
    .map((part, i) => (i === 0 ? part : separator + part))
    .filter((piece) => piece !== "");
}

function pushJoined(chunks: string[], pieces: readonly string[]): void {
  const joined = pieces.join("").trim();
  if (joined.length > 0) {
    chunks.push(joined);
  }
}
