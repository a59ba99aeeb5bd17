export type ChunkStrategy = "window" | "byte-window" | "structured" | "emergency";

export interface ChunkMeta {
  strategy: ChunkStrategy;
  /** Offset of the window in the normalized text (chars, or bytes for byte-window). */
  start?: number;
  end?: number;
  sheet?: string;
  rowStart?: number;
  rowEnd?: number;
  truncated?: boolean;
  language?: string;
  [key: string]: unknown;
}

export interface ChunkDraft {
  ordinal: number;
  content: string;
  meta: ChunkMeta;
}

export interface NewChunk extends ChunkDraft {
  embedding: number[] | null;
}

export interface Chunk {
  id: string;
  documentId: string;
  tenant: string;
  ordinal: number;
  content: string;
  embedding: number[] | null;
  meta: ChunkMeta;
  createdAt: Date;
}

export interface ChunkEmbedding {
  chunkId: string;
  embedding: number[];
}

export interface ChunkingOptions {
  windowSize: number;
  overlap: number;
  /** Fragments shorter than this (after trimming) are dropped. */
  minLength?: number;
  /** Byte length above which the byte-oriented window is used. */
  byteThreshold?: number;
  /** Allow the row-group chunker when structured data is present. */
  structureAware?: boolean;
  /** Upper bound of rows per structured chunk. */
  maxRowsPerChunk?: number;
}
