import type { SearchOptions } from "./search.js";

export const ANSWER_MODES = [
  "auto",
  "direct",
  "list",
  "summary",
  "quote",
  "table",
  "document_full",
] as const;

export type AnswerMode = (typeof ANSWER_MODES)[number];
export type ResolvedAnswerMode = Exclude<AnswerMode, "auto">;

export type AnswerLength = "auto" | "short" | "medium" | "long" | "xl";
export type AnswerFormat = "plain" | "markdown" | "html";
export type ContextFormat = "xml" | "markdown" | "plain";

export interface GenerationOptions {
  mode?: AnswerMode;
  length?: AnswerLength;
  format?: AnswerFormat;
  citations?: number;
  topK?: number;
  contextFormat?: ContextFormat;
  temperature?: number;
  maxTokens?: number;
  /** Run the retrieval fallback cascade when the first search finds nothing. */
  fallbackCascade?: boolean;
}

export interface AnswerSource {
  documentId: string;
  chunkId: string;
  ordinal: number;
  score: number;
  excerpt: string;
}

export type AnswerPath = "retrieval" | "transcript" | "document_full";

export interface AnswerResult {
  answer: string;
  confidence: number;
  sources: AnswerSource[];
  /** Milliseconds spent end to end. */
  generationTime: number;
  mode: ResolvedAnswerMode;
  path: AnswerPath;
  usedFallback: boolean;
  fallbackReason?: string;
  retrievalFallbackLevel: number;
}

export interface AnswerRequest {
  tenant: string;
  query: string;
  search?: SearchOptions;
  generation?: GenerationOptions;
}
