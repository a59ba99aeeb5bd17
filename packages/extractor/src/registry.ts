import type { DocumentFormat } from "@docsift/types";
import type { ExternalTools } from "./external-tool.js";
import type { IPdfReader } from "./pdf-reader.js";
import type { IFormatStrategy } from "./strategy.interface.js";
import { createTextStrategy } from "./strategies/text.js";
import { createHtmlStrategy } from "./strategies/html.js";
import { createPdfStrategy } from "./strategies/pdf.js";
import { createDocxStrategy } from "./strategies/docx.js";
import { createSpreadsheetStrategy } from "./strategies/spreadsheet.js";
import { createImageStrategy } from "./strategies/image.js";
import { createUniversalStrategy } from "./strategies/universal.js";

export type StrategyRegistry = ReadonlyMap<DocumentFormat, IFormatStrategy>;

export function createStrategyRegistry(pdfReader: IPdfReader, tools: ExternalTools): StrategyRegistry {
  const strategies: IFormatStrategy[] = [
    createPdfStrategy(pdfReader, tools),
    createDocxStrategy(tools),
    createSpreadsheetStrategy("xlsx"),
    createSpreadsheetStrategy("csv"),
    createUniversalStrategy(tools, "pptx"),
    createHtmlStrategy(),
    createTextStrategy(),
    createImageStrategy(tools),
    createUniversalStrategy(tools),
  ];

  return new Map(strategies.map((strategy) => [strategy.format, strategy]));
}
