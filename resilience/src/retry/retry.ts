import { type Clock, systemClock } from "../clock";
import {
  CancelledError,
  InvalidArgumentError,
  PermanentFailure,
  TimeoutError,
  errorMessage,
} from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import { type RetryPolicy, sampleDelay, validateRetryPolicy } from "./policy";

export interface RetryDiagnostics {
  attempts: number;
  elapsedMs: number;
  delays: number[];
}

export interface RetryOptions {
  isRetryable?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  label?: string;
  clock?: Clock;
  random?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

const RETRY_DIAGNOSTICS = Symbol.for("flakeproof.retryDiagnostics");

function attachDiagnostics(error: unknown, diagnostics: RetryDiagnostics): void {
  if (typeof error !== "object" || error === null || Object.isFrozen(error)) {
    return;
  }
  Object.defineProperty(error, RETRY_DIAGNOSTICS, {
    value: diagnostics,
    configurable: true,
    enumerable: false,
    writable: true,
  });
}

function isRetryDiagnostics(value: unknown): value is RetryDiagnostics {
  return (
    typeof value === "object" &&
    value !== null &&
    "attempts" in value &&
    typeof value.attempts === "number" &&
    "elapsedMs" in value &&
    typeof value.elapsedMs === "number" &&
    "delays" in value &&
    Array.isArray(value.delays)
  );
}

/** Attempt count, elapsed time and slept delays of the retry that raised `error`. */
export function getRetryDiagnostics(error: unknown): RetryDiagnostics | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, RETRY_DIAGNOSTICS);
  return isRetryDiagnostics(value) ? value : undefined;
}

function neverRetried(error: unknown): boolean {
  return (
    error instanceof PermanentFailure ||
    error instanceof InvalidArgumentError ||
    error instanceof CancelledError
  );
}

export async function retry<T>(
  operation: () => T | Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  validateRetryPolicy(policy);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const label = options.label ?? "operation";
  const startedAt = clock.now();
  const delays: number[] = [];

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new CancelledError(`${label} cancelled before attempt ${attempt}`, {
        cause: options.signal.reason,
      });
    }
    try {
      logger.debug(`${label}: attempt ${attempt}/${policy.maxAttempts}`);
      const result = await operation();
      if (attempt > 1) {
        logger.info(`${label}: succeeded on attempt ${attempt}`);
      }
      return result;
    } catch (error) {
      const exhausted = attempt >= policy.maxAttempts;
      const retryable =
        !neverRetried(error) && (options.isRetryable?.(error, attempt) ?? true);

      if (exhausted || !retryable) {
        const elapsedMs = clock.now() - startedAt;
        attachDiagnostics(error, { attempts: attempt, elapsedMs, delays });
        if (exhausted) {
          logger.error(`${label}: all ${policy.maxAttempts} attempts failed after ${elapsedMs}ms`);
        } else {
          logger.warn(`${label}: attempt ${attempt} failed with a permanent error: ${errorMessage(error)}`);
        }
        throw error;
      }

      const delayMs = sampleDelay(policy, attempt, options.random);
      logger.warn(`${label}: attempt ${attempt} failed: ${errorMessage(error)}`);
      if (options.onRetry) {
        try {
          options.onRetry(error, attempt, delayMs);
        } catch (callbackError) {
          logger.error(`${label}: retry callback error: ${errorMessage(callbackError)}`);
        }
      }
      logger.debug(`${label}: waiting ${delayMs}ms before retry`);
      delays.push(delayMs);
      await clock.sleep(delayMs, options.signal);
    }
  }
}

/**
 * Wraps `fn` so that every call goes through `retry` with the same policy.
 *
 * ```ts
 * const clickSubmit = withRetry((page: Page) => page.click("#submit"), policy);
 * await clickSubmit(page);
 * ```
 */
export function withRetry<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): (...args: A) => Promise<R> {
  const label = options.label ?? (fn.name || "wrapped");
  return (...args: A) => retry(() => fn(...args), policy, { ...options, label });
}

export interface RetryUntilOptions {
  timeoutMs: number;
  intervalMs: number;
  isRetryable?: (error: unknown) => boolean;
  label?: string;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Retries until `operation` succeeds or `timeoutMs` of wall-clock time has
 * passed. The `TimeoutError` carries the last failure as its `cause`.
 */
export async function retryUntil<T>(
  operation: () => T | Promise<T>,
  options: RetryUntilOptions,
): Promise<T> {
  if (!(options.timeoutMs > 0)) {
    throw new InvalidArgumentError("timeoutMs", `must be > 0, got ${options.timeoutMs}`);
  }
  if (!(options.intervalMs >= 0)) {
    throw new InvalidArgumentError("intervalMs", `must be >= 0, got ${options.intervalMs}`);
  }
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const label = options.label ?? "operation";
  const startedAt = clock.now();
  let lastError: unknown;
  let attempts = 0;

  while (clock.now() - startedAt < options.timeoutMs) {
    attempts += 1;
    try {
      logger.debug(`${label}: retry attempt ${attempts}`);
      return await operation();
    } catch (error) {
      if (neverRetried(error) || !(options.isRetryable?.(error) ?? true)) {
        throw error;
      }
      lastError = error;
      const remaining = options.timeoutMs - (clock.now() - startedAt);
      if (remaining <= 0) {
        break;
      }
      logger.debug(`${label}: attempt failed (${errorMessage(error)}), retrying`);
      await clock.sleep(Math.min(options.intervalMs, remaining), options.signal);
    }
  }

  const elapsedMs = clock.now() - startedAt;
  const suffix = lastError === undefined ? "" : ` (last error: ${errorMessage(lastError)})`;
  logger.error(`${label}: timed out after ${elapsedMs}ms and ${attempts} attempts${suffix}`);
  throw new TimeoutError({
    message: `${label} did not succeed after ${attempts} attempts${suffix}`,
    elapsedMs,
    polls: attempts,
    timeoutMs: options.timeoutMs,
    cause: lastError,
  });
}
