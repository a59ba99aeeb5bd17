import { z } from "zod";
import { loadJsonResource } from "@docsift/config";

export type DetectedLanguage = "en" | "pt" | "es" | "unknown";

const stopwordSchema = z.object({
  en: z.array(z.string()),
  pt: z.array(z.string()),
  es: z.array(z.string()),
});

const STOPWORDS = loadJsonResource(new URL("../data/stopwords.json", import.meta.url), stopwordSchema);

const LISTS: ReadonlyArray<[Exclude<DetectedLanguage, "unknown">, ReadonlySet<string>]> = [
  ["en", new Set(STOPWORDS.en)],
  ["pt", new Set(STOPWORDS.pt)],
  ["es", new Set(STOPWORDS.es)],
];

const SAMPLE_CHARS = 20_000;
const MIN_VOTES = 3;

/**
 * Stopword vote over the first part of the text. A tie or too few votes
 * gives "unknown".
 */
export function detectLanguage(text: string): DetectedLanguage {
  const tokens = text
    .slice(0, SAMPLE_CHARS)
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .filter((token) => token.length > 0);

  const votes = LISTS.map(([language, words]) => ({
    language,
    count: tokens.reduce((n, token) => (words.has(token) ? n + 1 : n), 0),
  })).sort((a, b) => b.count - a.count);

  const [first, second] = votes;
  if (!first || first.count < MIN_VOTES) return "unknown";
  if (second && second.count === first.count) return "unknown";
  return first.language;
}
