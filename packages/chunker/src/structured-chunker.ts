import type { ChunkDraft, ChunkingOptions, StructuredSheet } from "@docsift/types";
import type { ChunkInput, IChunker } from "./chunker.interface.js";

const DEFAULT_MAX_ROWS = 50;

function renderRow(sheet: StructuredSheet, row: Record<string, string>): string {
  return sheet.headers.map((header) => row[header] ?? "").join(" | ");
}

function sheetHeader(sheet: StructuredSheet): string {
  return `Sheet: ${sheet.name}\n${sheet.headers.join(" | ")}`;
}

/**
 * Groups consecutive rows of each sheet into chunks that fit the window,
 * repeating the sheet name and header row at the top of every chunk.
 * A row too long to fit even alone is truncated and flagged.
 */
export class StructuredChunker implements IChunker {
  readonly strategy = "structured";

  chunk({ structuredData }: ChunkInput, options: ChunkingOptions): ChunkDraft[] {
    if (!structuredData) return [];

    const maxRows = Math.max(1, options.maxRowsPerChunk ?? DEFAULT_MAX_ROWS);
    const chunks: ChunkDraft[] = [];

    for (const sheet of structuredData.sheets) {
      const header = sheetHeader(sheet);
      let lines: string[] = [];
      let length = header.length;
      let rowStart = 1;

      const flush = (rowEnd: number, truncated = false): void => {
        if (lines.length === 0) return;
        chunks.push({
          ordinal: chunks.length,
          content: [header, ...lines].join("\n"),
          meta: {
            strategy: this.strategy,
            sheet: sheet.name,
            rowStart,
            rowEnd,
            ...(truncated ? { truncated: true } : {}),
          },
        });
        lines = [];
        length = header.length;
      };

      sheet.rows.forEach((row, index) => {
        const rowNumber = index + 1;
        const line = renderRow(sheet, row);
        const fits = length + 1 + line.length <= options.windowSize;

        if (lines.length > 0 && (!fits || lines.length >= maxRows)) {
          flush(rowNumber - 1);
        }
        if (lines.length === 0) rowStart = rowNumber;

        if (header.length + 1 + line.length > options.windowSize) {
          const room = Math.max(1, options.windowSize - header.length - 1);
          lines.push(line.slice(0, room));
          flush(rowNumber, true);
          return;
        }

        lines.push(line);
        length += 1 + line.length;
      });

      flush(sheet.rows.length);
    }

    return chunks;
  }
}
