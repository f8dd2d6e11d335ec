import type { Document } from "@ragweave/types";

/** Copy of `document` with every newline removed from its content. */
export function removeNewlines(document: Document): Document {
  return {
    ...document,
    content: document.content.replace(/\n/g, ""),
    metadata: { ...document.metadata },
  };
}

export function cleanDocuments(documents: readonly Document[]): Document[] {
  return documents.map(removeNewlines);
}
