import { InvalidArgumentError } from "../errors";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 2_000,
  backoffMultiplier: 1,
  maxDelayMs: 30_000,
  jitter: false,
});

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(name, `expected a finite number, got ${value}`);
  }
}

/** Throws `InvalidArgumentError` naming the first field out of range. */
export function validateRetryPolicy(policy: RetryPolicy): void {
  requireFinite("maxAttempts", policy.maxAttempts);
  requireFinite("baseDelayMs", policy.baseDelayMs);
  requireFinite("backoffMultiplier", policy.backoffMultiplier);
  requireFinite("maxDelayMs", policy.maxDelayMs);
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidArgumentError("maxAttempts", `must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (policy.baseDelayMs < 0) {
    throw new InvalidArgumentError("baseDelayMs", `must be >= 0, got ${policy.baseDelayMs}`);
  }
  if (policy.backoffMultiplier < 1) {
    throw new InvalidArgumentError(
      "backoffMultiplier",
      `must be >= 1, got ${policy.backoffMultiplier}`,
    );
  }
  if (policy.maxDelayMs < 0) {
    throw new InvalidArgumentError("maxDelayMs", `must be >= 0, got ${policy.maxDelayMs}`);
  }
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  validateRetryPolicy(policy);
  return Object.freeze(policy);
}

/** Unjittered delay after the given failed attempt (1-based). */
export function computeDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(policy.maxDelayMs, raw);
}

/** Full jitter: uniform in [0, computeDelay]. */
export function sampleDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const ceiling = computeDelay(policy, attempt);
  if (!policy.jitter) {
    return ceiling;
  }
  const fraction = Math.min(Math.max(random(), 0), 1);
  return fraction * ceiling;
}

export function backoffSchedule(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  for (let attempt = 1; attempt < policy.maxAttempts; attempt += 1) {
    delays.push(computeDelay(policy, attempt));
  }
  return delays;
}
