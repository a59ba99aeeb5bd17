import type { AppConfig } from "@docsift/types";
import type { Logger } from "@docsift/logger";
import { ContentExtractor } from "./content-extractor.js";
import { PageLimitValidator } from "./page-limit-validator.js";
import { createExternalTools, type ExternalTools } from "./external-tool.js";
import { PdfjsReader, type IPdfReader } from "./pdf-reader.js";
import { createStrategyRegistry } from "./registry.js";

export interface ExtractionServices {
  extractor: ContentExtractor;
  pageLimitValidator: PageLimitValidator;
}

export interface ExtractionOverrides {
  pdfReader?: IPdfReader;
  tools?: ExternalTools;
  logger?: Logger;
}

export function createExtractionServices(
  config: Pick<AppConfig, "ingestion" | "tools">,
  overrides: ExtractionOverrides = {},
): ExtractionServices {
  const pdfReader = overrides.pdfReader ?? new PdfjsReader();
  const tools = overrides.tools ?? createExternalTools(config.tools);

  return {
    extractor: new ContentExtractor({
      maxFileSizeBytes: config.ingestion.maxFileSizeBytes,
      strategies: createStrategyRegistry(pdfReader, tools),
      logger: overrides.logger,
    }),
    pageLimitValidator: new PageLimitValidator({
      maxPages: config.ingestion.maxPages,
      pdfReader,
      logger: overrides.logger,
    }),
  };
}
