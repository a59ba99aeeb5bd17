import type { ChunkDraft, ChunkStrategy, ChunkingOptions, StructuredData } from "@docsift/types";

export interface ChunkInput {
  /** Already normalized text. */
  text: string;
  structuredData?: StructuredData;
}

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(input: ChunkInput, options: ChunkingOptions): ChunkDraft[];
}
