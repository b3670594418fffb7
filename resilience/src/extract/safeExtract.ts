import { type Clock, systemClock } from "../clock";
import {
  CancelledError,
  InvalidArgumentError,
  NotFoundError,
  TimeoutError,
  errorMessage,
} from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import type { ExtractionResult } from "../types";

export interface ExtractionContext {
  /** Aborted when the outer timeout fires. Pass it to inner waits. */
  signal: AbortSignal;
  /** Clock time at which the outer guard gives up. */
  deadline: number;
  /** Records the raw engine text the value was derived from. */
  captureRaw(raw: string): void;
}

export interface ExtractOptions {
  clock?: Clock;
  logger?: Logger;
  label?: string;
  /** Extra absence classification for engine-specific errors. */
  isAbsence?: (error: unknown) => boolean;
}

class ExtractionDeadline extends CancelledError {
  constructor(timeoutMs: number) {
    super(`Extraction exceeded ${timeoutMs}ms`);
    this.name = "ExtractionDeadline";
  }
}

/**
 * Absence or timing failures: the element was not there in time. Engine
 * timeout errors are recognised by name (Playwright's is `TimeoutError`).
 */
export function isAbsenceFailure(error: unknown): boolean {
  if (error instanceof InvalidArgumentError) {
    return false;
  }
  if (
    error instanceof NotFoundError ||
    error instanceof TimeoutError ||
    error instanceof ExtractionDeadline
  ) {
    return true;
  }
  return error instanceof Error && error.name === "TimeoutError";
}

export function notFound<T>(defaultValue: T): ExtractionResult<T> {
  return { value: defaultValue, found: false, rawSource: null };
}

export async function extract<T>(
  operation: (context: ExtractionContext) => T | Promise<T>,
  defaultValue: T,
  timeoutMs: number,
  options: ExtractOptions = {},
): Promise<ExtractionResult<T>> {
  if (!(timeoutMs > 0)) {
    throw new InvalidArgumentError("timeoutMs", `must be > 0, got ${timeoutMs}`);
  }
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const label = options.label ?? "extraction";
  const controller = new AbortController();
  const guard = new AbortController();
  let rawSource: string | null = null;

  const context: ExtractionContext = {
    signal: controller.signal,
    deadline: clock.now() + timeoutMs,
    captureRaw: (raw) => {
      rawSource = raw;
    },
  };

  const deadline = clock.sleep(timeoutMs, guard.signal).then(
    () => {
      const reason = new ExtractionDeadline(timeoutMs);
      controller.abort(reason);
      throw reason;
    },
    () => undefined,
  );

  try {
    const value = await Promise.race([
      Promise.resolve().then(() => operation(context)),
      deadline.then(() => {
        throw new ExtractionDeadline(timeoutMs);
      }),
    ]);
    return { value, found: true, rawSource };
  } catch (error) {
    if (isAbsenceFailure(error) || (options.isAbsence?.(error) ?? false)) {
      logger.debug(`${label}: falling back to default (${errorMessage(error)})`);
      return notFound(defaultValue);
    }
    throw error;
  } finally {
    guard.abort();
  }
}
