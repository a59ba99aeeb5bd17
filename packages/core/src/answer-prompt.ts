import type { AnswerFormat, AnswerLength, ResolvedAnswerMode } from "@docsift/types";

export const GROUNDING_INSTRUCTIONS =
  "You answer questions using only the provided context. Do not use outside knowledge. " +
  "If the context does not contain enough information to answer, say clearly that the available data is insufficient.";

const MODE_INSTRUCTIONS: Record<ResolvedAnswerMode, string> = {
  direct: "Answer the question directly.",
  list: "Answer with a complete list, one item per line, without summarizing items away.",
  summary: "Write a summary of the relevant content.",
  quote: "Quote the exact passages from the context that answer the question, in quotation marks.",
  table: "Present the answer as a table.",
  document_full: "Analyze the whole document provided as context.",
};

const LENGTH_INSTRUCTIONS: Record<AnswerLength, string | null> = {
  auto: null,
  short: "Keep the answer to two or three sentences.",
  medium: "Keep the answer to one or two paragraphs.",
  long: "Give a detailed answer of several paragraphs.",
  xl: "Give an exhaustive answer covering every relevant detail.",
};

const LENGTH_TOKEN_LIMITS: Record<AnswerLength, number | undefined> = {
  auto: undefined,
  short: 256,
  medium: 512,
  long: 1024,
  xl: 2048,
};

const FORMAT_INSTRUCTIONS: Record<AnswerFormat, string> = {
  plain: "Use plain text without markup.",
  markdown: "Format the answer in Markdown.",
  html: "Format the answer as simple HTML without scripts or styles.",
};

export interface AnswerPromptOptions {
  mode: ResolvedAnswerMode;
  length: AnswerLength;
  format: AnswerFormat;
  citations: number;
}

export function buildAnswerPrompt(query: string, options: AnswerPromptOptions): string {
  const lines = [MODE_INSTRUCTIONS[options.mode]];
  const length = LENGTH_INSTRUCTIONS[options.length];
  if (length) lines.push(length);
  lines.push(FORMAT_INSTRUCTIONS[options.format]);
  if (options.citations > 0) {
    lines.push(`Cite at most ${String(options.citations)} sources by their number, like [1].`);
  }
  lines.push("", `Question: ${query}`);
  return lines.join("\n");
}

export function maxTokensForLength(length: AnswerLength): number | undefined {
  return LENGTH_TOKEN_LIMITS[length];
}
