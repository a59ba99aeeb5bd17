import { z } from "zod";
import type { AnswerFormat, AnswerLength, AnswerMode, ResolvedAnswerMode } from "@docsift/types";
import { ANSWER_MODES } from "@docsift/types";
import { loadJsonResource } from "@docsift/config";

const hintsSchema = z.object({
  list: z.array(z.string()),
  summary: z.array(z.string()),
  quote: z.array(z.string()),
  table: z.array(z.string()),
  document_full: z.array(z.string()),
});

const HINTS = loadJsonResource(new URL("../data/answer-modes.json", import.meta.url), hintsSchema);

// Checked in this order; the first match wins.
const DETECTION_ORDER = ["list", "summary", "quote", "table", "document_full"] as const;

const LENGTHS: readonly AnswerLength[] = ["auto", "short", "medium", "long", "xl"];
const FORMATS: readonly AnswerFormat[] = ["plain", "markdown", "html"];

export function isAnswerMode(value: string): value is AnswerMode {
  return ANSWER_MODES.some((mode) => mode === value);
}

// Hints match whole words; letters include accented ones, so "table" stays out of "vegetable".
function hintPattern(hints: string[]): RegExp {
  const alternatives = hints.map((hint) => hint.trim().replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}])`, "u");
}

const HINT_PATTERNS = {
  list: hintPattern(HINTS.list),
  summary: hintPattern(HINTS.summary),
  quote: hintPattern(HINTS.quote),
  table: hintPattern(HINTS.table),
  document_full: hintPattern(HINTS.document_full),
} satisfies Record<(typeof DETECTION_ORDER)[number], RegExp>;

function matchesHints(query: string, mode: (typeof DETECTION_ORDER)[number]): boolean {
  return HINT_PATTERNS[mode].test(query);
}

export function hasSummaryIntent(query: string): boolean {
  return matchesHints(query.toLowerCase(), "summary");
}

/**
 * An explicit mode other than "auto" wins. Otherwise the query's wording
 * picks one, and plain questions get "direct".
 */
export function detectAnswerMode(query: string, requested = "auto"): ResolvedAnswerMode {
  const mode = requested.trim().toLowerCase();
  if (isAnswerMode(mode) && mode !== "auto") return mode;

  const lower = query.toLowerCase();
  return DETECTION_ORDER.find((candidate) => matchesHints(lower, candidate)) ?? "direct";
}

export function normalizeLength(value: string | undefined): AnswerLength {
  const lower = value?.toLowerCase();
  return LENGTHS.find((length) => length === lower) ?? "auto";
}

export function normalizeFormat(value: string | undefined): AnswerFormat {
  const lower = value?.toLowerCase();
  return FORMATS.find((format) => format === lower) ?? "plain";
}

export function clampCitations(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(10, Math.trunc(value)));
}

export function clampTopK(value: number | undefined, fallback = 5): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.min(30, Math.trunc(value)));
}
