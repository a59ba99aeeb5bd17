import { z } from "zod";
import { loadJsonResource } from "@docsift/config";

const rewritesSchema = z.object({
  maxExpansionTerms: z.number().int().positive(),
  maxKeywords: z.number().int().positive(),
  synonyms: z.record(z.array(z.string())),
  stopwords: z.array(z.string()),
});

const REWRITES = loadJsonResource(new URL("../data/query-rewrites.json", import.meta.url), rewritesSchema);
const STOPWORDS = new Set(REWRITES.stopwords);

/**
 * Append synonyms of the words the query contains, at most
 * `maxExpansionTerms` of them. Unchanged when nothing matches.
 */
export function expandQuery(query: string): string {
  const lower = query.toLowerCase();
  const extra: string[] = [];
  for (const [word, synonyms] of Object.entries(REWRITES.synonyms)) {
    if (lower.includes(word)) extra.push(...synonyms);
  }
  if (extra.length === 0) return query;
  return `${query} ${extra.slice(0, REWRITES.maxExpansionTerms).join(" ")}`;
}

/**
 * Reduce a query to its keywords: stopwords and words of two characters or
 * fewer go, words with digits come first, at most `maxKeywords` remain.
 */
export function simplifyQuery(query: string): string {
  const words = query
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOPWORDS.has(word));
  const unique = [...new Set(words)];
  const withDigits = unique.filter((word) => /\d/.test(word));
  const rest = unique.filter((word) => !/\d/.test(word));
  const keywords = [...withDigits, ...rest].slice(0, REWRITES.maxKeywords);
  return keywords.length > 0 ? keywords.join(" ") : query;
}
