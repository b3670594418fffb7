import { type Clock, systemClock } from "../clock";
import type { Logger } from "../logging/logger";
import { type ResolvedElement, resolveFirst } from "../locate/resolve";
import { type PriceOptions, extractPrice, sanitizeText } from "../text/normalize";
import type { AutomationEngine, ExtractionResult, LocatorCandidate } from "../types";
import { type ExtractionContext, extract } from "./safeExtract";

export interface ElementExtractOptions {
  timeoutMs: number;
  timeoutPerCandidateMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
}

async function resolveWithin(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  options: ElementExtractOptions,
  context: ExtractionContext,
): Promise<ResolvedElement> {
  const clock = options.clock ?? systemClock;
  const remaining = context.deadline - clock.now();
  return resolveFirst(engine, candidates, {
    timeoutPerCandidateMs: options.timeoutPerCandidateMs ?? options.timeoutMs,
    totalTimeoutMs: Math.max(1, remaining),
    pollIntervalMs: options.pollIntervalMs,
    clock,
    signal: context.signal,
    logger: options.logger,
  });
}

/** Visible text of the first resolving candidate, whitespace-collapsed unless `trim` is false. */
export async function extractText(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  defaultValue: string,
  options: ElementExtractOptions & { trim?: boolean },
): Promise<ExtractionResult<string>> {
  return extract(
    async (context) => {
      const resolved = await resolveWithin(engine, candidates, options, context);
      const raw = await resolved.element.text();
      context.captureRaw(raw);
      return options.trim === false ? raw : sanitizeText(raw);
    },
    defaultValue,
    options.timeoutMs,
    { clock: options.clock, logger: options.logger, label: "extractText" },
  );
}

export async function extractAttribute(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  name: string,
  defaultValue: string,
  options: ElementExtractOptions,
): Promise<ExtractionResult<string>> {
  const result = await extract(
    async (context) => {
      const resolved = await resolveWithin(engine, candidates, options, context);
      const value = await resolved.element.attribute(name);
      if (value !== null) {
        context.captureRaw(value);
      }
      return value;
    },
    null,
    options.timeoutMs,
    { clock: options.clock, logger: options.logger, label: `extractAttribute(${name})` },
  );
  if (!result.found || result.value === null) {
    return { value: defaultValue, found: false, rawSource: null };
  }
  return { value: result.value, found: true, rawSource: result.rawSource };
}

/**
 * Reads the element text and parses the first price for `symbol` out of it.
 * Text without a recognisable price counts as not found.
 */
export async function extractElementPrice(
  engine: AutomationEngine,
  candidates: LocatorCandidate,
  symbol: string,
  options: ElementExtractOptions & { price?: PriceOptions },
): Promise<ExtractionResult<number>> {
  const result = await extract(
    async (context) => {
      const resolved = await resolveWithin(engine, candidates, options, context);
      const raw = await resolved.element.text();
      context.captureRaw(raw);
      return extractPrice(raw, symbol, options.price);
    },
    null,
    options.timeoutMs,
    { clock: options.clock, logger: options.logger, label: "extractElementPrice" },
  );
  if (!result.found || result.value === null) {
    return { value: null, found: false, rawSource: result.rawSource };
  }
  return { value: result.value, found: true, rawSource: result.rawSource };
}
