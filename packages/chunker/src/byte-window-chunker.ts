import type { ChunkDraft, ChunkingOptions } from "@docsift/types";
import type { ChunkInput, IChunker } from "./chunker.interface.js";
import { windowStep } from "./normalize.js";

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/** Move a byte offset forward to the next UTF-8 character boundary. */
function toBoundary(bytes: Buffer, offset: number): number {
  let position = Math.min(offset, bytes.length);
  while (position < bytes.length && isContinuationByte(bytes[position])) {
    position++;
  }
  return position;
}

/**
 * Windows measured in UTF-8 bytes, for multi-megabyte inputs where slicing
 * by code unit is the bottleneck. Sizes and `start`/`end` meta are bytes.
 *
 * Both window edges move forward to a character boundary, so a window can
 * run up to three bytes past `windowSize` but never splits a character.
 */
export class ByteWindowChunker implements IChunker {
  readonly strategy = "byte-window";

  chunk({ text }: ChunkInput, { windowSize, overlap }: ChunkingOptions): ChunkDraft[] {
    const bytes = Buffer.from(text, "utf8");
    const step = windowStep(windowSize, overlap);
    const chunks: ChunkDraft[] = [];

    for (let start = 0; start < bytes.length; start = toBoundary(bytes, start + step)) {
      const end = toBoundary(bytes, start + windowSize);
      const content = bytes.toString("utf8", start, end).trim();
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
