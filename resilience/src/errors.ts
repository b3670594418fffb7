import type { CandidateAttempt } from "./types";

export type ResilienceErrorCode =
  | "TRANSIENT_FAILURE"
  | "PERMANENT_FAILURE"
  | "NOT_FOUND"
  | "TIMEOUT"
  | "INVALID_ARGUMENT"
  | "CANCELLED";

export class ResilienceError extends Error {
  readonly code: ResilienceErrorCode;

  constructor(code: ResilienceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResilienceError";
    this.code = code;
  }
}

/**
 * An operation failed in a way that may succeed on a later attempt.
 * Any error is treated like this by `retry` unless classified otherwise.
 */
export class TransientFailure extends ResilienceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSIENT_FAILURE", message, options);
    this.name = "TransientFailure";
  }
}

/**
 * A failure the caller has classified as non-retryable. `retry` re-throws it
 * on the attempt that raised it.
 */
export class PermanentFailure extends ResilienceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERMANENT_FAILURE", message, options);
    this.name = "PermanentFailure";
  }
}

function describeAttempt(attempt: CandidateAttempt): string {
  const detail = attempt.error ? `, ${attempt.error}` : "";
  return `  ${attempt.index + 1}. ${attempt.descriptor} -> ${attempt.outcome} (${attempt.durationMs}ms, ${attempt.polls} polls${detail})`;
}

export class NotFoundError extends ResilienceError {
  readonly candidates: readonly string[];
  readonly attempts: readonly CandidateAttempt[];
  readonly elapsedMs: number;

  constructor(params: {
    candidates: readonly string[];
    attempts: readonly CandidateAttempt[];
    elapsedMs: number;
    reason?: string;
  }) {
    const reason = params.reason ?? "No candidate resolved to a visible element";
    const lines = params.attempts.map(describeAttempt);
    super(
      "NOT_FOUND",
      [`${reason} after ${params.elapsedMs}ms. Tried:`, ...lines].join("\n"),
    );
    this.name = "NotFoundError";
    this.candidates = [...params.candidates];
    this.attempts = [...params.attempts];
    this.elapsedMs = params.elapsedMs;
  }
}

export class TimeoutError extends ResilienceError {
  readonly elapsedMs: number;
  readonly polls: number;
  readonly timeoutMs: number;

  constructor(params: {
    message?: string;
    elapsedMs: number;
    polls: number;
    timeoutMs: number;
    cause?: unknown;
  }) {
    const message = params.message ?? "Condition not met within timeout";
    super(
      "TIMEOUT",
      `${message} (timeout: ${params.timeoutMs}ms, elapsed: ${params.elapsedMs}ms, polls: ${params.polls})`,
      params.cause === undefined ? undefined : { cause: params.cause },
    );
    this.name = "TimeoutError";
    this.elapsedMs = params.elapsedMs;
    this.polls = params.polls;
    this.timeoutMs = params.timeoutMs;
  }
}

export class InvalidArgumentError extends ResilienceError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super("INVALID_ARGUMENT", `Invalid ${argument}: ${message}`);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

export class CancelledError extends ResilienceError {
  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super("CANCELLED", message, options);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isResilienceError(error: unknown): error is ResilienceError {
  return error instanceof ResilienceError;
}
