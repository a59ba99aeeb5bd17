import { AppError } from "./app-error.js";

export interface ErrorExtras {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      ...options,
    });
    this.fields = fields;
  }
}

/**
 * Input is well-formed but too large to process; raised before any extraction.
 */
export class PageLimitExceededError extends AppError {
  public readonly estimatedPages: number;
  public readonly maxPages: number;

  constructor(estimatedPages: number, maxPages: number, options?: ErrorExtras) {
    super({
      message: `Document has an estimated ${String(estimatedPages)} pages, above the limit of ${String(maxPages)}`,
      statusCode: 422,
      code: "PAGE_LIMIT_EXCEEDED",
      ...options,
    });
    this.estimatedPages = estimatedPages;
    this.maxPages = maxPages;
  }
}

export class ExtractionError extends AppError {
  public readonly attempted: string[];
  public readonly supportedFormats: string[];

  constructor(
    message = "No extraction method produced usable content",
    attempted: string[] = [],
    supportedFormats: string[] = [],
    options?: ErrorExtras,
  ) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      ...options,
    });
    this.attempted = attempted;
    this.supportedFormats = supportedFormats;
  }
}

export class ProcessingError extends AppError {
  public readonly stage: string;

  constructor(message = "Processing failed", stage: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "PROCESSING_FAILED",
      ...options,
    });
    this.stage = stage;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      ...options,
    });
    this.service = service;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      ...options,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      ...options,
    });
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(message = "Operation timed out", timeoutMs: number, options?: ErrorExtras) {
    super({
      message,
      statusCode: 504,
      code: "TIMEOUT",
      ...options,
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An external extraction tool is not configured or not installed.
 * Extraction treats this as a soft failure of one method.
 */
export class ToolUnavailableError extends AppError {
  public readonly tool: string;

  constructor(tool: string, message = `Tool "${tool}" is not available`, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "TOOL_UNAVAILABLE",
      ...options,
    });
    this.tool = tool;
  }
}
