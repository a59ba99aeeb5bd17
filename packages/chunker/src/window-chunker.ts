import type { ChunkDraft, ChunkingOptions } from "@docsift/types";
import type { ChunkInput, IChunker } from "./chunker.interface.js";
import { windowStep } from "./normalize.js";

/**
 * Character windows of `windowSize`, advancing by `windowSize - overlap`.
 * Whitespace-only windows are dropped; ordinals stay gapless.
 */
export class WindowChunker implements IChunker {
  readonly strategy = "window";

  chunk({ text }: ChunkInput, { windowSize, overlap }: ChunkingOptions): ChunkDraft[] {
    const step = windowStep(windowSize, overlap);
    const chunks: ChunkDraft[] = [];

    for (let start = 0; start < text.length; start += step) {
      const end = Math.min(start + windowSize, text.length);
      const content = text.slice(start, end).trim();
      if (content.length === 0) continue;

      chunks.push({
        ordinal: chunks.length,
        content,
        meta: { strategy: this.strategy, start, end },
      });
    }

    return chunks;
  }
}
