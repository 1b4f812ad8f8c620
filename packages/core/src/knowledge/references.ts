import type { Reference } from "../types";

/**
 * Citation block appended to the final answer.
 * Returns "" when there is nothing to cite.
 */
export function formatReferences(references: Reference[]): string {
  if (references.length === 0) return "";

  let block = "\n\n##### References:\n";
  for (const reference of references) {
    block += `  * [${reference.title}](${normalizeReferenceUrl(reference.url)})\n`;
  }
  return block;
}

// Drops credentials and fragments and percent-encodes the path. Unparseable
// values are cited as given.
export function normalizeReferenceUrl(raw: string): string {
  if (!URL.canParse(raw)) return raw;
  const url = new URL(raw);
  return `${url.protocol}//${url.host}${url.pathname}${url.search}`;
}
