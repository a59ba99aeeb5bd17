import type { ContextFormat, SearchHit } from "@docsift/types";

/**
 * Formats retrieved chunks for the generation prompt.
 *
 * - xml: `<document>` tags inside a `<context>` element
 * - markdown: one `###` section per source
 * - plain: numbered sections
 *
 * Source numbers start at 1 and are what citations refer to.
 */
export function assembleContext(hits: SearchHit[], format: ContextFormat = "plain"): string {
  if (hits.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(hits);
    case "markdown":
      return assembleMarkdown(hits);
    case "plain":
    default:
      return assemblePlain(hits);
  }
}

function escapeXml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

function assembleXml(hits: SearchHit[]): string {
  const parts = hits.map(
    ({ chunk }, i) =>
      `<document index="${String(i + 1)}" source="${escapeXml(chunk.documentId)}" chunk="${String(chunk.ordinal)}">\n${escapeXml(chunk.content)}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(hits: SearchHit[]): string {
  const parts = hits.map(
    ({ chunk }, i) => `### Source ${String(i + 1)} (${chunk.documentId}, chunk ${String(chunk.ordinal)})\n\n${chunk.content}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(hits: SearchHit[]): string {
  const parts = hits.map(
    ({ chunk }, i) => `[${String(i + 1)}] (Source: ${chunk.documentId}, chunk ${String(chunk.ordinal)})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}
