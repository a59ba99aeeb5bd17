import { z } from "zod";
import type { ExternalTools } from "../external-tool.js";
import type { IPdfReader } from "../pdf-reader.js";
import type { IFormatStrategy } from "../strategy.interface.js";
import { toolAddition, toolMethod } from "./tool-method.js";

const cellSchema = z.union([z.string(), z.number(), z.null()]);
const tablesSchema = z.array(z.array(z.array(cellSchema)));

/**
 * Table tools may print a JSON array of tables (rows of cells) or plain
 * text; JSON is rendered as pipe-separated rows.
 */
export function renderTables(output: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return output.trim();
  }

  const tables = tablesSchema.safeParse(parsed);
  if (!tables.success) return output.trim();

  return tables.data
    .map((rows) => rows.map((cells) => cells.map((cell) => (cell === null ? "" : String(cell))).join(" | ")).join("\n"))
    .join("\n\n");
}

/**
 * Text layer first; a scanned PDF with little text falls through to the
 * pdftotext tool and then OCR. Tables and text inside embedded images are
 * appended when their tools produce anything.
 */
export function createPdfStrategy(reader: IPdfReader, tools: ExternalTools): IFormatStrategy {
  return {
    format: "pdf",
    methods: [
      {
        name: "pdf-text-layer",
        budget: "extraction",
        run: async ({ data }) => {
          const { text, pageCount } = await reader.readText(data);
          return { text, pageCount };
        },
      },
      toolMethod(tools.pdftotext, "extraction"),
      toolMethod(tools.ocr, "ocr"),
    ],
    additions: [
      toolAddition(tools.pdfTables, "Tables", "tables", renderTables),
      toolAddition(tools.pdfImageOcr, "Image text", "ocr"),
    ],
  };
}
