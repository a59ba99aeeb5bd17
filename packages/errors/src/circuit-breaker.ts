import CircuitBreaker from "opossum";
import type { Logger } from "@docsift/logger";

export interface CircuitBreakerOptions {
  /** Call timeout; a slower call counts as a failure. Default: 10000 */
  timeout?: number;
  /** Failure percentage that opens the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** How long the circuit stays open before a trial call. Default: 30000 */
  resetTimeout?: number;
  rollingCountTimeout?: number;
  rollingCountBuckets?: number;
  /** Minimum calls in the window before the threshold applies. */
  volumeThreshold?: number;
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
} as const;

export type Breaker<TArgs extends unknown[], TResult> = CircuitBreaker<TArgs, TResult>;

/**
 * Wrap an async call in an opossum breaker with state changes logged.
 */
export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): Breaker<TArgs, TResult> {
  const { logger, ...breakerOptions } = options ?? {};
  const breaker = new CircuitBreaker<TArgs, TResult>(fn, {
    ...DEFAULT_OPTIONS,
    ...breakerOptions,
    name,
  });

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit opened");
  });
  breaker.on("halfOpen", () => {
    logger?.info({ breaker: name }, "circuit half-open");
  });
  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}
