import type { DocumentFormat } from "@docsift/types";

export interface FormatChunkDefaults {
  windowSize: number;
  overlap: number;
  /** Row cap for structured chunks. */
  maxRows?: number;
}

export const FORMAT_CHUNK_DEFAULTS: Readonly<Record<DocumentFormat, FormatChunkDefaults>> = {
  pdf: { windowSize: 1000, overlap: 150 },
  docx: { windowSize: 800, overlap: 120 },
  xlsx: { windowSize: 500, overlap: 50, maxRows: 50 },
  csv: { windowSize: 300, overlap: 30, maxRows: 20 },
  pptx: { windowSize: 600, overlap: 80 },
  html: { windowSize: 900, overlap: 100 },
  text: { windowSize: 1000, overlap: 150 },
  image: { windowSize: 1000, overlap: 150 },
  universal: { windowSize: 1000, overlap: 150 },
};

export const DEFAULT_MIN_CHUNK_LENGTH = 50;
export const DEFAULT_BYTE_THRESHOLD = 2 * 1024 * 1024;
