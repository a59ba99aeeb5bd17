import type {
  ChunkDraft,
  ChunkStrategy,
  ChunkingOptions,
  DocumentFormat,
  StructuredData,
} from "@docsift/types";
import { ValidationError } from "@docsift/errors";
import type { IChunker } from "./chunker.interface.js";
import { WindowChunker } from "./window-chunker.js";
import { ByteWindowChunker } from "./byte-window-chunker.js";
import { StructuredChunker } from "./structured-chunker.js";
import { normalizeText } from "./normalize.js";
import { DEFAULT_BYTE_THRESHOLD, DEFAULT_MIN_CHUNK_LENGTH, FORMAT_CHUNK_DEFAULTS } from "./defaults.js";

export function createChunker(strategy: Exclude<ChunkStrategy, "emergency">): IChunker {
  switch (strategy) {
    case "window":
      return new WindowChunker();
    case "byte-window":
      return new ByteWindowChunker();
    case "structured":
      return new StructuredChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}

export interface DocumentChunkInput {
  text: string;
  format?: DocumentFormat;
  structuredData?: StructuredData;
}

export interface ChunkingResult {
  chunks: ChunkDraft[];
  strategy: ChunkStrategy;
  windowSize: number;
  overlap: number;
}

/**
 * Request options win over per-format defaults; text defaults otherwise.
 */
export function resolveChunkingOptions(
  format: DocumentFormat | undefined,
  options: Partial<ChunkingOptions> = {},
): ChunkingOptions {
  const defaults = FORMAT_CHUNK_DEFAULTS[format ?? "text"];
  const resolved: ChunkingOptions = {
    windowSize: options.windowSize ?? defaults.windowSize,
    overlap: options.overlap ?? defaults.overlap,
    minLength: options.minLength ?? DEFAULT_MIN_CHUNK_LENGTH,
    byteThreshold: options.byteThreshold ?? DEFAULT_BYTE_THRESHOLD,
    structureAware: options.structureAware ?? true,
    maxRowsPerChunk: options.maxRowsPerChunk ?? defaults.maxRows,
  };

  const fields: Record<string, string> = {};
  if (!Number.isInteger(resolved.windowSize) || resolved.windowSize < 1) {
    fields["windowSize"] = "must be a positive integer";
  }
  if (!Number.isInteger(resolved.overlap) || resolved.overlap < 0) {
    fields["overlap"] = "must be a non-negative integer";
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunking options", fields);
  }

  return resolved;
}

/**
 * Split text into plain chunk strings with the character window.
 */
export function chunkText(text: string, windowSize: number, overlap: number): string[] {
  const options = resolveChunkingOptions(undefined, { windowSize, overlap });
  return new WindowChunker().chunk({ text: normalizeText(text) }, options).map((c) => c.content);
}

/**
 * Chunk one document's text. Structured data selects the row-group
 * chunker; large texts use byte windows. Window output below `minLength`
 * is dropped, and if nothing survives a single chunk of the leading
 * `windowSize` characters is returned, so non-empty text never yields
 * zero chunks.
 */
export function chunkDocument(
  input: DocumentChunkInput,
  options: Partial<ChunkingOptions> = {},
): ChunkingResult {
  const resolved = resolveChunkingOptions(input.format, options);
  const text = normalizeText(input.text);
  const base = { windowSize: resolved.windowSize, overlap: resolved.overlap };

  if (resolved.structureAware && input.structuredData) {
    const chunks = createChunker("structured").chunk({ text, structuredData: input.structuredData }, resolved);
    if (chunks.length > 0) {
      return { chunks, strategy: "structured", ...base };
    }
  }

  if (text.length === 0) {
    return { chunks: [], strategy: "window", ...base };
  }

  const strategy =
    Buffer.byteLength(text, "utf8") > (resolved.byteThreshold ?? DEFAULT_BYTE_THRESHOLD)
      ? "byte-window"
      : "window";
  const minLength = resolved.minLength ?? 0;

  const kept = createChunker(strategy)
    .chunk({ text }, resolved)
    .filter((chunk) => chunk.content.length >= minLength)
    .map((chunk, ordinal) => ({ ...chunk, ordinal }));

  if (kept.length > 0) {
    return { chunks: kept, strategy, ...base };
  }

  const content = text.slice(0, resolved.windowSize).trim();
  return {
    chunks: [
      {
        ordinal: 0,
        content,
        meta: {
          strategy: "window",
          start: 0,
          end: Math.min(text.length, resolved.windowSize),
          ...(text.length > resolved.windowSize ? { truncated: true } : {}),
        },
      },
    ],
    strategy: "window",
    ...base,
  };
}

/**
 * Last-resort single chunk used when regular chunking throws.
 */
export function emergencyChunk(text: string, maxLength: number): ChunkDraft {
  const normalized = normalizeText(text);
  return {
    ordinal: 0,
    content: normalized.slice(0, maxLength),
    meta: {
      strategy: "emergency",
      start: 0,
      end: Math.min(normalized.length, maxLength),
      truncated: normalized.length > maxLength,
    },
  };
}
