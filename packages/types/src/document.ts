import type { ChunkStrategy } from "./chunk.js";
import type { DocumentFormat } from "./extraction.js";

export type DocumentSource = "upload" | "url" | "paste" | "video" | "batch";

export const DOCUMENT_SOURCES: readonly DocumentSource[] = [
  "upload",
  "url",
  "paste",
  "video",
  "batch",
];

export interface StructuredSheet {
  name: string;
  headers: string[];
  rows: Record<string, string>[];
}

export interface StructuredData {
  sheets: StructuredSheet[];
}

export interface ChunkingSummary {
  strategy: ChunkStrategy;
  windowSize: number;
  overlap: number;
  profile: string;
  degraded: boolean;
}

export interface DocumentMetadata {
  extractionMethod?: string;
  qualityScore?: number;
  language?: string;
  format?: DocumentFormat;
  fileName?: string;
  fileSize?: number;
  mimeType?: string;
  pageCount?: number;
  storedPath?: string;
  sourceUrl?: string;
  structuredData?: StructuredData;
  chunking?: ChunkingSummary;
  suggestedQuestions?: string[];
  documentType?: string;
  suggestionsGeneratedAt?: string;
  [key: string]: unknown;
}

export interface Document {
  id: string;
  tenant: string;
  title: string;
  source: DocumentSource;
  metadata: DocumentMetadata;
  createdAt: Date;
}

export interface NewDocument {
  tenant: string;
  title: string;
  source: DocumentSource;
  metadata: DocumentMetadata;
}
