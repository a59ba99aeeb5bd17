export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions, SerializedError } from "./app-error.js";

export {
  ValidationError,
  PageLimitExceededError,
  ExtractionError,
  ProcessingError,
  ExternalServiceError,
  NotFoundError,
  ConflictError,
  TimeoutError,
  ToolUnavailableError,
} from "./errors.js";
export type { ErrorExtras } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { Breaker, CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, isRetryable, calculateDelay } from "./retry.js";
export type { RetryOptions } from "./retry.js";

export { withTimeout } from "./timeout.js";
