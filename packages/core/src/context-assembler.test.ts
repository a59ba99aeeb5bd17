import { describe, it, expect } from "vitest";
import type { SearchHit } from "@docsift/types";
import { assembleContext } from "./context-assembler.js";

function hit(documentId: string, ordinal: number, content: string): SearchHit {
  return {
    chunk: {
      id: `${documentId}-${String(ordinal)}`,
      documentId,
      tenant: "tenant-a",
      ordinal,
      content,
      embedding: null,
      meta: { strategy: "window" },
      createdAt: new Date(0),
    },
    score: 1,
    source: "keyword",
  };
}

const HITS = [hit("doc-1", 0, "First chunk content."), hit("doc-2", 3, "Second chunk content.")];

describe("assembleContext", () => {
  it("returns an empty string for no hits", () => {
    expect(assembleContext([], "xml")).toBe("");
  });

  it("numbers plain sections from 1 by default", () => {
    expect(assembleContext(HITS)).toBe(
      "[1] (Source: doc-1, chunk 0)\nFirst chunk content.\n\n[2] (Source: doc-2, chunk 3)\nSecond chunk content.",
    );
  });

  it("wraps hits in document tags for xml", () => {
    expect(assembleContext(HITS, "xml")).toBe(
      [
        "<context>",
        '<document index="1" source="doc-1" chunk="0">',
        "First chunk content.",
        "</document>",
        '<document index="2" source="doc-2" chunk="3">',
        "Second chunk content.",
        "</document>",
        "</context>",
      ].join("\n"),
    );
  });

  it("escapes markup inside xml content", () => {
    expect(assembleContext([hit("doc-1", 0, 'a < b & "c"')], "xml")).toContain("a &lt; b &amp; &quot;c&quot;");
  });

  it("separates markdown sources with rules", () => {
    expect(assembleContext(HITS, "markdown")).toBe(
      "## Retrieved Context\n\n### Source 1 (doc-1, chunk 0)\n\nFirst chunk content.\n\n---\n\n### Source 2 (doc-2, chunk 3)\n\nSecond chunk content.",
    );
  });
});
