import { z } from "zod";
import { EMBEDDING_COLUMN_DIMENSIONS, type AppConfig } from "@docsift/types";

const MIB = 1024 * 1024;

function intVar(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());
}

function weightVar(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().min(0).max(1));
}

/**
 * Split a command line on whitespace. Blank means "not configured".
 */
export function parseCommand(value: string | undefined): string[] {
  if (!value) return [];
  return value.trim().split(/\s+/).filter((part) => part.length > 0);
}

export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Storage ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgres://") || url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgres:// or postgresql://",
      }),
    DATABASE_POOL_MAX: intVar("20"),
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),
    STORAGE_DIR: z.string().default("./storage"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: intVar(String(EMBEDDING_COLUMN_DIMENSIONS)).refine(
      (dimensions) => dimensions === EMBEDDING_COLUMN_DIMENSIONS,
      { message: `EMBEDDING_DIMENSIONS must be ${String(EMBEDDING_COLUMN_DIMENSIONS)}, the width of the vector column` },
    ),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),
    EMBEDDING_CACHE_MAX_ENTRIES: intVar("10000"),
    EMBEDDING_CACHE_TTL_MS: intVar(String(30 * 24 * 60 * 60 * 1000)),

    // ---------- Generation ----------
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),
    GENERATION_TIMEOUT_MS: intVar("30000"),
    FALLBACK_SUMMARY_CHARS: intVar("1200"),
    TRANSCRIPT_CHAR_BUDGET: intVar("24000"),

    // ---------- Ingestion ----------
    MAX_FILE_SIZE_MB: intVar("500"),
    MAX_PAGES: intVar("5000"),
    MIN_CHUNK_LENGTH: intVar("50"),
    BYTE_CHUNKING_THRESHOLD_BYTES: intVar(String(2 * MIB)),

    // ---------- Search ----------
    SEARCH_VECTOR_WEIGHT: weightVar("0.7"),
    SEARCH_KEYWORD_WEIGHT: weightVar("0.3"),
    SEARCH_SIMILARITY_THRESHOLD: weightVar("0.1"),

    // ---------- External tools ----------
    OCR_COMMAND: z.string().default("tesseract stdin stdout"),
    PDFTOTEXT_COMMAND: z.string().default("pdftotext -layout - -"),
    PDF_TABLES_COMMAND: z.string().optional(),
    PDF_IMAGE_OCR_COMMAND: z.string().optional(),
    OFFICE_EXTRACTOR_COMMAND: z.string().optional(),

    // ---------- Worker ----------
    WORKER_CONCURRENCY: intVar("5"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

/**
 * Validate the environment and map it onto {@link AppConfig}.
 * Throws a ZodError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
      cacheMaxEntries: parsed.EMBEDDING_CACHE_MAX_ENTRIES,
      cacheTtlMs: parsed.EMBEDDING_CACHE_TTL_MS,
    },

    generation: {
      cohereModel: parsed.COHERE_CHAT_MODEL,
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      fallbackSummaryChars: parsed.FALLBACK_SUMMARY_CHARS,
      transcriptCharBudget: parsed.TRANSCRIPT_CHAR_BUDGET,
    },

    ingestion: {
      maxFileSizeBytes: parsed.MAX_FILE_SIZE_MB * MIB,
      maxPages: parsed.MAX_PAGES,
      minChunkLength: parsed.MIN_CHUNK_LENGTH,
      byteChunkingThreshold: parsed.BYTE_CHUNKING_THRESHOLD_BYTES,
      storageDir: parsed.STORAGE_DIR,
    },

    search: {
      vectorWeight: parsed.SEARCH_VECTOR_WEIGHT,
      keywordWeight: parsed.SEARCH_KEYWORD_WEIGHT,
      similarityThreshold: parsed.SEARCH_SIMILARITY_THRESHOLD,
    },

    tools: {
      ocr: parseCommand(parsed.OCR_COMMAND),
      pdftotext: parseCommand(parsed.PDFTOTEXT_COMMAND),
      pdfTables: parseCommand(parsed.PDF_TABLES_COMMAND),
      pdfImageOcr: parseCommand(parsed.PDF_IMAGE_OCR_COMMAND),
      office: parseCommand(parsed.OFFICE_EXTRACTOR_COMMAND),
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
