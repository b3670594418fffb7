import { type Clock, systemClock } from "../clock";
import { NotFoundError, errorMessage } from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import { type ResolvedElement, resolveFirst } from "../locate/resolve";
import type { AutomationEngine, CandidateAttempt, ElementHandle, LocatorCandidate } from "../types";

export type InteractionAction = "click" | "dismiss" | "detect" | { fill: string };

export type InteractionOutcome =
  | {
      status: "performed";
      action: string;
      descriptor: string;
      attempts: CandidateAttempt[];
      elapsedMs: number;
    }
  | {
      status: "skipped_absent";
      action: string;
      attempts: CandidateAttempt[];
      elapsedMs: number;
    }
  | {
      status: "failed";
      action: string;
      descriptor: string;
      reason: string;
      error: unknown;
      attempts: CandidateAttempt[];
      elapsedMs: number;
    };

export interface OptionalInteractionOptions {
  /** Per-candidate wait. Absence is the expected outcome, so keep it short. */
  shortTimeoutMs?: number;
  totalTimeoutMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

export const DEFAULT_SHORT_TIMEOUT_MS = 2_000;

function actionName(action: InteractionAction): string {
  return typeof action === "string" ? action : "fill";
}

async function perform(element: ElementHandle, action: InteractionAction): Promise<void> {
  if (typeof action !== "string") {
    await element.fill(action.fill);
    return;
  }
  switch (action) {
    case "click":
      await element.click();
      return;
    case "dismiss":
      await element.dismiss();
      return;
    case "detect":
      return;
  }
}

/**
 * Performs `action` on the first visible candidate if one shows up within a
 * short budget. Absence is reported as `skipped_absent` and a failing action
 * as `failed`; neither throws. Caller errors and cancellation still do.
 *
 * ```ts
 * await tryInteract(engine, ["#cookie-accept", "text=Accept all"], "click");
 * ```
 */
export async function tryInteract(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  action: InteractionAction,
  options: OptionalInteractionOptions = {},
): Promise<InteractionOutcome> {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const shortTimeoutMs = options.shortTimeoutMs ?? DEFAULT_SHORT_TIMEOUT_MS;
  const name = actionName(action);
  const startedAt = clock.now();

  let resolved: ResolvedElement;
  try {
    resolved = await resolveFirst(engine, candidates, {
      timeoutPerCandidateMs: shortTimeoutMs,
      totalTimeoutMs: options.totalTimeoutMs ?? shortTimeoutMs * Math.max(1, candidates.length),
      pollIntervalMs: options.pollIntervalMs,
      clock,
      signal: options.signal,
      logger: silentOnAbsence(logger),
    });
  } catch (error) {
    // The one place a NotFoundError is expected and swallowed.
    if (error instanceof NotFoundError) {
      logger.debug(`optional ${name} skipped: nothing matched ${candidates.join(" | ")}`);
      return {
        status: "skipped_absent",
        action: name,
        attempts: [...error.attempts],
        elapsedMs: clock.now() - startedAt,
      };
    }
    throw error;
  }

  try {
    await perform(resolved.element, action);
    logger.info(`handled optional element: ${name} ${resolved.descriptor}`);
    return {
      status: "performed",
      action: name,
      descriptor: resolved.descriptor,
      attempts: resolved.attempts,
      elapsedMs: clock.now() - startedAt,
    };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn(`optional ${name} on ${resolved.descriptor} failed: ${reason}`);
    return {
      status: "failed",
      action: name,
      descriptor: resolved.descriptor,
      reason,
      error,
      attempts: resolved.attempts,
      elapsedMs: clock.now() - startedAt,
    };
  }
}

function silentOnAbsence(logger: Logger): Logger {
  return {
    debug: (message) => logger.debug(message),
    info: (message) => logger.info(message),
    // NotFoundError is reported by the caller as a skip, not a warning.
    warn: (message) => logger.debug(message),
    error: (message, error) => logger.error(message, error),
    child: (prefix) => silentOnAbsence(logger.child(prefix)),
  };
}
