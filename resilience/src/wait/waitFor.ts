import { type Clock, systemClock } from "../clock";
import { InvalidArgumentError, TimeoutError } from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import type { WaitCondition } from "../types";

export interface WaitOptions {
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
  /** Prefix for the TimeoutError message. */
  message?: string;
}

export interface PollResult {
  met: boolean;
  elapsedMs: number;
  polls: number;
}

export interface WaitReport {
  elapsedMs: number;
  polls: number;
}

export function validateCondition(condition: WaitCondition): void {
  if (!(condition.timeoutMs >= 0)) {
    throw new InvalidArgumentError("timeoutMs", `must be >= 0, got ${condition.timeoutMs}`);
  }
  if (!(condition.pollIntervalMs > 0)) {
    throw new InvalidArgumentError(
      "pollIntervalMs",
      `must be > 0, got ${condition.pollIntervalMs}`,
    );
  }
}

/**
 * Evaluates the predicate until it returns true or the deadline passes.
 * A check only runs when a full poll interval fits before the deadline, so an
 * interval longer than the timeout means a single evaluation.
 * Never throws for an unmet condition; predicate errors propagate.
 */
export async function pollUntil(
  condition: WaitCondition,
  options: WaitOptions = {},
): Promise<PollResult> {
  validateCondition(condition);
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let polls = 0;

  for (;;) {
    polls += 1;
    if (await condition.predicate()) {
      return { met: true, elapsedMs: clock.now() - startedAt, polls };
    }
    const elapsedMs = clock.now() - startedAt;
    const remaining = condition.timeoutMs - elapsedMs;
    if (remaining <= 0) {
      return { met: false, elapsedMs, polls };
    }
    if (condition.pollIntervalMs > remaining) {
      // No full interval left: sleep out the budget without another check.
      await clock.sleep(remaining, options.signal);
      return { met: false, elapsedMs: clock.now() - startedAt, polls };
    }
    await clock.sleep(condition.pollIntervalMs, options.signal);
  }
}

export async function waitFor(
  condition: WaitCondition,
  options: WaitOptions = {},
): Promise<WaitReport> {
  const logger = options.logger ?? defaultLogger;
  logger.debug(`waiting for condition (timeout: ${condition.timeoutMs}ms)`);
  const result = await pollUntil(condition, options);
  if (result.met) {
    logger.debug(`condition met after ${result.elapsedMs}ms (${result.polls} polls)`);
    return { elapsedMs: result.elapsedMs, polls: result.polls };
  }
  const error = new TimeoutError({
    message: options.message,
    elapsedMs: result.elapsedMs,
    polls: result.polls,
    timeoutMs: condition.timeoutMs,
  });
  logger.error(error.message);
  throw error;
}

export interface ValueChangeOptions<T> extends WaitOptions {
  initial?: T;
  timeoutMs: number;
  pollIntervalMs: number;
  equals?: (a: T, b: T) => boolean;
}

/** Waits until `read()` differs from `initial` (read once up front when omitted). */
export async function waitForValueChange<T>(
  read: () => T | Promise<T>,
  options: ValueChangeOptions<T>,
): Promise<T> {
  const equals = options.equals ?? Object.is;
  const initial = options.initial !== undefined ? options.initial : await read();
  let latest = initial;
  await waitFor(
    {
      predicate: async () => {
        latest = await read();
        return !equals(latest, initial);
      },
      timeoutMs: options.timeoutMs,
      pollIntervalMs: options.pollIntervalMs,
    },
    { ...options, message: options.message ?? "Value did not change within timeout" },
  );
  return latest;
}
