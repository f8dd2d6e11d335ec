import { FILE_TITLE_KEY } from "@ragweave/types";
import type { Document } from "@ragweave/types";

/**
 * Render retrieved documents as tool observations for the agent:
 * each document's content, its source title and a separator.
 */
export function formatDocuments(documents: readonly Document[]): string {
  return documents.map(formatDocument).join("");
}

function formatDocument(document: Document): string {
  const title = document.metadata[FILE_TITLE_KEY];
  const source = typeof title === "string" && title.length > 0 ? title : "N/A";
  return `${document.content}\nSOURCE: ${source}\n---\n\n`;
}
