import {
  CancelledError,
  InvalidArgumentError,
  NotFoundError,
  PermanentFailure,
  TimeoutError,
  TransientFailure,
  errorMessage,
} from "../errors";

export type FailureClassification = "transient" | "permanent";

export type ClassifiedFailure = {
  classification: FailureClassification;
  reason: string;
  message: string;
};

const TRANSIENT_PATTERNS: Array<{ reason: string; needles: string[] }> = [
  { reason: "timeout", needles: ["timeout", "timed out"] },
  {
    reason: "stale-element",
    needles: [
      "element is not attached",
      "element is detached",
      "stale element",
      "element handle is disposed",
      "not visible",
      "intercepts pointer events",
    ],
  },
  {
    reason: "runtime-instability",
    needles: [
      "target closed",
      "execution context was destroyed",
      "navigation interrupted",
      "connection reset",
      "econnreset",
      "temporarily unavailable",
    ],
  },
];

/**
 * Message-based classification of automation failures. Typed errors from
 * this package are classified by kind; anything else unknown is permanent.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  const message = errorMessage(error);

  if (error instanceof PermanentFailure || error instanceof InvalidArgumentError) {
    return { classification: "permanent", reason: "caller-classified", message };
  }
  if (error instanceof CancelledError) {
    return { classification: "permanent", reason: "cancelled", message };
  }
  if (error instanceof TransientFailure) {
    return { classification: "transient", reason: "caller-classified", message };
  }
  if (error instanceof TimeoutError) {
    return { classification: "transient", reason: "timeout", message };
  }
  if (error instanceof NotFoundError) {
    return { classification: "transient", reason: "not-found", message };
  }

  const normalized = message.toLowerCase();
  for (const pattern of TRANSIENT_PATTERNS) {
    if (pattern.needles.some((needle) => normalized.includes(needle))) {
      return { classification: "transient", reason: pattern.reason, message };
    }
  }
  return { classification: "permanent", reason: "unknown", message };
}

export function isTransientAutomationError(error: unknown): boolean {
  return classifyFailure(error).classification === "transient";
}
