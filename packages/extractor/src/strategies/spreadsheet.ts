import * as XLSX from "xlsx";
import type { StructuredData, StructuredSheet } from "@docsift/types";
import type { ExtractionInput, IFormatStrategy, MethodOutput } from "../strategy.interface.js";
import { decodeText } from "./text.js";

function cellText(cell: unknown): string {
  if (typeof cell === "string") return cell.trim();
  if (cell === null || cell === undefined) return "";
  return String(cell).trim();
}

function readWorkbook({ data, format }: ExtractionInput): XLSX.WorkBook {
  if (format === "csv") {
    return XLSX.read(decodeText(data), { type: "string", raw: true });
  }
  return XLSX.read(data, { type: "array" });
}

/** Blank headers become column_N; repeats get a numeric suffix. */
function uniqueHeaders(cells: string[]): string[] {
  const seen = new Map<string, number>();
  return cells.map((cell, index) => {
    const base = cell === "" ? `column_${String(index + 1)}` : cell;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${String(count)}`;
  });
}

export function sheetToStructured(name: string, sheet: XLSX.WorkSheet): StructuredSheet | null {
  const grid = XLSX.utils
    .sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", raw: false, blankrows: false })
    .map((row) => row.map(cellText))
    .filter((row) => row.some((cell) => cell !== ""));

  const [headerRow, ...body] = grid;
  if (!headerRow) return null;

  const headers = uniqueHeaders(headerRow);
  const rows = body.map((cells) =>
    Object.fromEntries(headers.map((header, index) => [header, cells[index] ?? ""])),
  );

  return { name, headers, rows };
}

export function flattenStructured(data: StructuredData): string {
  return data.sheets
    .map((sheet) =>
      [
        `=== Sheet: ${sheet.name} ===`,
        sheet.headers.join(" | "),
        ...sheet.rows.map((row) => sheet.headers.map((h) => row[h] ?? "").join(" | ")),
      ].join("\n"),
    )
    .join("\n\n");
}

function extractStructured(input: ExtractionInput): Promise<MethodOutput> {
  const workbook = readWorkbook(input);
  const sheets: StructuredSheet[] = [];

  for (const name of workbook.SheetNames) {
    const sheet = workbook.Sheets[name];
    if (!sheet) continue;
    const structured = sheetToStructured(name, sheet);
    if (structured) sheets.push(structured);
  }

  if (sheets.length === 0) {
    return Promise.reject(new Error("Workbook has no non-empty sheets"));
  }

  const structuredData: StructuredData = { sheets };
  return Promise.resolve({ text: flattenStructured(structuredData), structuredData });
}

function extractFlat(input: ExtractionInput): Promise<MethodOutput> {
  if (input.format === "csv") {
    return Promise.resolve({ text: decodeText(input.data) });
  }

  const workbook = readWorkbook(input);
  const parts = workbook.SheetNames.flatMap((name) => {
    const sheet = workbook.Sheets[name];
    return sheet ? [`=== Sheet: ${name} ===\n${XLSX.utils.sheet_to_csv(sheet)}`] : [];
  });
  return Promise.resolve({ text: parts.join("\n\n") });
}

/**
 * Sheets with their header rows kept as structured data for the row-group
 * chunker, then a flat text rendering if the workbook cannot be read that way.
 */
export function createSpreadsheetStrategy(format: "xlsx" | "csv"): IFormatStrategy {
  return {
    format,
    methods: [
      { name: "structured", budget: "extraction", run: extractStructured },
      { name: "flat", budget: "extraction", run: extractFlat },
    ],
  };
}
