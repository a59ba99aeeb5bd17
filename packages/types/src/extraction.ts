import type { StructuredData } from "./document.js";

export const DOCUMENT_FORMATS = [
  "pdf",
  "docx",
  "xlsx",
  "csv",
  "pptx",
  "html",
  "text",
  "image",
  "universal",
] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export type TimeoutBudget = "extraction" | "ocr" | "tables";

export interface MethodAttempt {
  method: string;
  ok: boolean;
  chars: number;
  durationMs: number;
  error?: string;
}

export interface ExtractionMetadata {
  format: DocumentFormat;
  extension: string;
  fileSize: number;
  pageCount?: number;
  language?: string;
  structuredData?: StructuredData;
  /** Best-effort outputs appended to the main text ("tables", "image-ocr"). */
  additions: string[];
  attempts: MethodAttempt[];
}

export interface ExtractionSuccess {
  success: true;
  content: string;
  qualityScore: number;
  method: string;
  metadata: ExtractionMetadata;
}

export type ExtractionFailureReason = "too_large" | "no_content";

export interface ExtractionFailure {
  success: false;
  reason: ExtractionFailureReason;
  error: string;
  supportedFormats: string[];
  attempts: MethodAttempt[];
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export interface PageEstimate {
  valid: boolean;
  estimatedPages: number;
  maxPages: number;
  method: "exact" | "rows" | "size";
  message?: string;
}
