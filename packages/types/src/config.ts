export type NodeEnv = "development" | "test" | "production";
export type LogLevel = "debug" | "info" | "warn" | "error";
export type EmbeddingProviderName = "cohere" | "bge-m3";

export interface ToolCommands {
  ocr: string[];
  pdftotext: string[];
  pdfTables: string[];
  pdfImageOcr: string[];
  office: string[];
}

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;

  database: {
    url: string;
    poolMax: number;
  };

  redis: {
    url: string;
  };

  embeddings: {
    provider: EmbeddingProviderName;
    dimensions: number;
    cohereApiKey: string;
    cohereModel: string;
    bgeM3Url?: string;
    cacheMaxEntries: number;
    cacheTtlMs: number;
  };

  generation: {
    cohereModel: string;
    timeoutMs: number;
    fallbackSummaryChars: number;
    transcriptCharBudget: number;
  };

  ingestion: {
    maxFileSizeBytes: number;
    maxPages: number;
    minChunkLength: number;
    byteChunkingThreshold: number;
    storageDir: string;
  };

  search: {
    vectorWeight: number;
    keywordWeight: number;
    similarityThreshold: number;
  };

  tools: ToolCommands;

  worker: {
    concurrency: number;
  };
}
