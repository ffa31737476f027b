import CircuitBreaker from "opossum";
import type { Logger } from "@kindex/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  rollingCountTimeout?: number;
  rollingCountBuckets?: number;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  logger: Logger,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...options, name });
  const log = logger.child({ circuit: name });

  breaker.on("open", () => {
    log.warn("circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    log.warn("circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    log.info("circuit closed");
  });

  return breaker;
}
