import { readFile, stat } from "node:fs/promises";
import type { PageEstimate } from "@docsift/types";
import { errorMessage, PageLimitExceededError } from "@docsift/errors";
import { createSilentLogger, type Logger } from "@docsift/logger";
import { formatForExtension } from "./format.js";
import type { IPdfReader } from "./pdf-reader.js";
import type { ExtractionSourceData } from "./content-extractor.js";

const BYTES_PER_PAGE = 4096;
const SPREADSHEET_BYTES_PER_PAGE = 10_240;
const PRESENTATION_BYTES_PER_PAGE = 204_800;
const CSV_LINES_PER_PAGE = 50;

export interface PageLimitValidatorOptions {
  maxPages: number;
  pdfReader: IPdfReader;
  logger?: Logger;
}

function pagesForSize(size: number, bytesPerPage: number): number {
  return Math.ceil(size / bytesPerPage);
}

function countLines(data: Uint8Array): number {
  let lines = 1;
  for (const byte of data) {
    if (byte === 0x0a) lines++;
  }
  return lines;
}

/**
 * Cheap page estimate taken before extraction. Only PDFs are opened (for
 * their page count); everything else is sized by bytes or lines.
 */
export class PageLimitValidator {
  private readonly maxPages: number;
  private readonly pdfReader: IPdfReader;
  private readonly logger: Logger;

  constructor(options: PageLimitValidatorOptions) {
    this.maxPages = options.maxPages;
    this.pdfReader = options.pdfReader;
    this.logger = options.logger ?? createSilentLogger();
  }

  async estimateAndValidate(source: ExtractionSourceData, extension: string): Promise<PageEstimate> {
    const size = typeof source === "string" ? (await stat(source)).size : source.byteLength;
    const { pages, method } = await this.estimate(source, extension, size);
    const estimatedPages = Math.max(1, pages);
    const valid = estimatedPages <= this.maxPages;

    return {
      valid,
      estimatedPages,
      maxPages: this.maxPages,
      method,
      ...(valid ? {} : { message: new PageLimitExceededError(estimatedPages, this.maxPages).message }),
    };
  }

  /** Throws PageLimitExceededError when the estimate is over the limit. */
  async assertWithinLimit(source: ExtractionSourceData, extension: string): Promise<PageEstimate> {
    const estimate = await this.estimateAndValidate(source, extension);
    if (!estimate.valid) {
      throw new PageLimitExceededError(estimate.estimatedPages, estimate.maxPages, {
        details: { extension, method: estimate.method },
      });
    }
    return estimate;
  }

  private async estimate(
    source: ExtractionSourceData,
    extension: string,
    size: number,
  ): Promise<Pick<PageEstimate, "method"> & { pages: number }> {
    const bySize = (bytesPerPage: number) => ({
      pages: pagesForSize(size, bytesPerPage),
      method: "size" as const,
    });

    try {
      switch (formatForExtension(extension)) {
        case "pdf":
          return { pages: await this.pdfReader.countPages(await this.read(source)), method: "exact" };
        case "xlsx":
          return bySize(SPREADSHEET_BYTES_PER_PAGE);
        case "csv":
          return {
            pages: Math.ceil(countLines(await this.read(source)) / CSV_LINES_PER_PAGE),
            method: "rows",
          };
        case "pptx":
          return bySize(PRESENTATION_BYTES_PER_PAGE);
        case "image":
          return { pages: 1, method: "size" };
        default:
          return bySize(BYTES_PER_PAGE);
      }
    } catch (err) {
      this.logger.warn({ extension, err: errorMessage(err) }, "page estimate failed, using file size");
      return bySize(BYTES_PER_PAGE);
    }
  }

  private async read(source: ExtractionSourceData): Promise<Uint8Array> {
    return typeof source === "string" ? new Uint8Array(await readFile(source)) : source;
  }
}
