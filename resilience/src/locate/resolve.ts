import { type Clock, systemClock } from "../clock";
import { InvalidArgumentError, NotFoundError, errorMessage } from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import type {
  AutomationEngine,
  CandidateAttempt,
  ElementHandle,
  LocatorCandidate,
} from "../types";
import { pollUntil } from "../wait/waitFor";

export interface ResolveOptions {
  timeoutPerCandidateMs: number;
  totalTimeoutMs: number;
  pollIntervalMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ResolvedElement {
  element: ElementHandle;
  descriptor: string;
  index: number;
  attempts: CandidateAttempt[];
  elapsedMs: number;
}

export const DEFAULT_PROBE_INTERVAL_MS = 100;

type ProbeResult =
  | { ok: true; element: ElementHandle; attempt: CandidateAttempt }
  | { ok: false; attempt: CandidateAttempt };

function validateResolveInput(candidates: LocatorCandidate, options: ResolveOptions): void {
  if (candidates.length === 0) {
    throw new InvalidArgumentError("candidates", "at least one locator descriptor is required");
  }
  if (!(options.timeoutPerCandidateMs > 0)) {
    throw new InvalidArgumentError(
      "timeoutPerCandidateMs",
      `must be > 0, got ${options.timeoutPerCandidateMs}`,
    );
  }
  if (!(options.totalTimeoutMs > 0)) {
    throw new InvalidArgumentError("totalTimeoutMs", `must be > 0, got ${options.totalTimeoutMs}`);
  }
}

async function probeCandidate(
  engine: AutomationEngine,
  descriptor: string,
  index: number,
  budgetMs: number,
  options: ResolveOptions,
  clock: Clock,
): Promise<ProbeResult> {
  const started = clock.now();
  const seen: { element: ElementHandle | null; hidden: boolean; error?: string } = {
    element: null,
    hidden: false,
  };

  const poll = await pollUntil(
    {
      predicate: async () => {
        try {
          const handle = await engine.locate(descriptor);
          if (!handle) {
            return false;
          }
          if (await handle.isVisible()) {
            seen.element = handle;
            return true;
          }
          seen.hidden = true;
          return false;
        } catch (error) {
          seen.error = errorMessage(error);
          return false;
        }
      },
      timeoutMs: budgetMs,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS,
    },
    { clock, signal: options.signal },
  );

  const attempt: CandidateAttempt = {
    index,
    descriptor,
    outcome: "absent",
    durationMs: clock.now() - started,
    polls: poll.polls,
  };
  if (poll.met && seen.element) {
    attempt.outcome = "visible";
    return { ok: true, element: seen.element, attempt };
  }
  if (seen.hidden) {
    attempt.outcome = "hidden";
  } else if (seen.error !== undefined) {
    attempt.outcome = "error";
  }
  if (seen.error !== undefined) {
    attempt.error = seen.error;
  }
  return { ok: false, attempt };
}

function skippedAttempt(descriptor: string, index: number): CandidateAttempt {
  return { index, descriptor, outcome: "skipped", durationMs: 0, polls: 0 };
}

/**
 * Probes candidates strictly in order and returns the first one that
 * becomes visible. Each candidate gets `timeoutPerCandidateMs`, capped by
 * what is left of `totalTimeoutMs`.
 */
export async function resolveFirst(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  options: ResolveOptions,
): Promise<ResolvedElement> {
  validateResolveInput(candidates, options);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const startedAt = clock.now();
  const attempts: CandidateAttempt[] = [];

  for (let index = 0; index < candidates.length; index += 1) {
    const descriptor = candidates[index];
    const remaining = options.totalTimeoutMs - (clock.now() - startedAt);
    if (remaining <= 0) {
      attempts.push(skippedAttempt(descriptor, index));
      continue;
    }
    const budget = Math.min(options.timeoutPerCandidateMs, remaining);
    const probe = await probeCandidate(engine, descriptor, index, budget, options, clock);
    attempts.push(probe.attempt);
    if (probe.ok) {
      logger.debug(`found element with locator: ${descriptor}`);
      return {
        element: probe.element,
        descriptor,
        index,
        attempts,
        elapsedMs: clock.now() - startedAt,
      };
    }
    logger.debug(`locator '${descriptor}' not found (${probe.attempt.outcome})`);
  }

  const error = new NotFoundError({
    candidates,
    attempts,
    elapsedMs: clock.now() - startedAt,
  });
  logger.warn(error.message);
  throw error;
}

export interface ResolvedMatch {
  element: ElementHandle;
  descriptor: string;
  index: number;
}

export interface ResolvedAll {
  matches: ResolvedMatch[];
  attempts: CandidateAttempt[];
  elapsedMs: number;
}

/** Like `resolveFirst`, but keeps probing and returns every visible match. */
export async function resolveAll(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  options: ResolveOptions,
): Promise<ResolvedAll> {
  validateResolveInput(candidates, options);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const startedAt = clock.now();
  const attempts: CandidateAttempt[] = [];
  const matches: ResolvedMatch[] = [];

  for (let index = 0; index < candidates.length; index += 1) {
    const descriptor = candidates[index];
    const remaining = options.totalTimeoutMs - (clock.now() - startedAt);
    if (remaining <= 0) {
      attempts.push(skippedAttempt(descriptor, index));
      continue;
    }
    const budget = Math.min(options.timeoutPerCandidateMs, remaining);
    const probe = await probeCandidate(engine, descriptor, index, budget, options, clock);
    attempts.push(probe.attempt);
    if (probe.ok) {
      matches.push({ element: probe.element, descriptor, index });
    }
  }

  const elapsedMs = clock.now() - startedAt;
  if (matches.length === 0) {
    const error = new NotFoundError({
      candidates,
      attempts,
      elapsedMs,
      reason: "None of the candidates found visible elements",
    });
    logger.warn(error.message);
    throw error;
  }
  return { matches, attempts, elapsedMs };
}
