export { ContentExtractor } from "./content-extractor.js";
export type { ContentExtractorOptions, ExtractionSourceData } from "./content-extractor.js";
export { PageLimitValidator } from "./page-limit-validator.js";
export type { PageLimitValidatorOptions } from "./page-limit-validator.js";
export { createExtractionServices } from "./factory.js";
export type { ExtractionServices, ExtractionOverrides } from "./factory.js";
export { createStrategyRegistry } from "./registry.js";
export type { StrategyRegistry } from "./registry.js";
export { SubprocessTool, createExternalTools } from "./external-tool.js";
export type { IExternalTool, ExternalTools, ToolRunOptions } from "./external-tool.js";
export { PdfjsReader } from "./pdf-reader.js";
export type { IPdfReader, PdfText } from "./pdf-reader.js";
export type {
  ExtractionInput,
  ExtractionMethod,
  ExtractionAddition,
  IFormatStrategy,
  MethodOutput,
} from "./strategy.interface.js";
export { runMethodChain, MIN_CONTENT_CHARS } from "./method-chain.js";
export { adaptiveTimeouts } from "./adaptive-timeout.js";
export type { TimeoutBudgets } from "./adaptive-timeout.js";
export { scoreQuality } from "./quality.js";
export { detectLanguage } from "./language.js";
export type { DetectedLanguage } from "./language.js";
export {
  normalizeExtension,
  formatForExtension,
  extensionForResource,
  SUPPORTED_EXTENSIONS,
} from "./format.js";
export { flattenStructured } from "./strategies/spreadsheet.js";
