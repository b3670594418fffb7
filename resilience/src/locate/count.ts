import { InvalidArgumentError } from "../errors";
import { type Logger, defaultLogger } from "../logging/logger";
import type { AutomationEngine } from "../types";
import { type WaitOptions, type WaitReport, waitFor } from "../wait/waitFor";

export type CountComparison = "equal" | "greater" | "less" | "atLeast" | "atMost";

export interface CountOptions extends WaitOptions {
  expected: number;
  comparison?: CountComparison;
  timeoutMs: number;
  pollIntervalMs?: number;
}

export interface CountReport extends WaitReport {
  count: number;
}

export function compareCount(actual: number, expected: number, comparison: CountComparison): boolean {
  switch (comparison) {
    case "equal":
      return actual === expected;
    case "greater":
      return actual > expected;
    case "less":
      return actual < expected;
    case "atLeast":
      return actual >= expected;
    case "atMost":
      return actual <= expected;
    default:
      throw new InvalidArgumentError("comparison", `unsupported comparison: ${String(comparison)}`);
  }
}

/** Waits until the number of elements matching `descriptor` satisfies the comparison. */
export async function waitForCount(
  engine: AutomationEngine,
  descriptor: string,
  options: CountOptions,
): Promise<CountReport> {
  const comparison = options.comparison ?? "equal";
  const logger: Logger = options.logger ?? defaultLogger;
  let count = 0;
  const report = await waitFor(
    {
      predicate: async () => {
        count = await engine.count(descriptor);
        return compareCount(count, options.expected, comparison);
      },
      timeoutMs: options.timeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? 500,
    },
    {
      clock: options.clock,
      signal: options.signal,
      logger,
      message:
        options.message ??
        `Element count for '${descriptor}' never satisfied ${comparison} ${options.expected}`,
    },
  );
  logger.debug(`element count condition met: ${count} ${comparison} ${options.expected}`);
  return { ...report, count };
}
