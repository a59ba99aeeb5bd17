import type { DocumentFormat, StructuredData, TimeoutBudget } from "@docsift/types";
import type { TimeoutBudgets } from "./adaptive-timeout.js";

export interface ExtractionInput {
  data: Uint8Array;
  extension: string;
  format: DocumentFormat;
  fileSize: number;
  timeouts: TimeoutBudgets;
}

export interface MethodOutput {
  text: string;
  structuredData?: StructuredData;
  pageCount?: number;
}

/** One way of getting text out of a file. */
export interface ExtractionMethod {
  readonly name: string;
  readonly budget: TimeoutBudget;
  run(input: ExtractionInput): Promise<MethodOutput>;
}

/** Best-effort output appended after the main text under a heading. */
export interface ExtractionAddition {
  readonly name: string;
  readonly heading: string;
  readonly budget: TimeoutBudget;
  run(input: ExtractionInput): Promise<string>;
}

export interface IFormatStrategy {
  readonly format: DocumentFormat;
  /** Tried in order until one yields enough text. */
  readonly methods: readonly ExtractionMethod[];
  readonly additions?: readonly ExtractionAddition[];
}
