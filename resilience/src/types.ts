/** Position and size in CSS pixels, relative to the viewport. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ViewportSize {
  width: number;
  height: number;
}

export interface ElementHandle {
  isVisible(): Promise<boolean>;
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  dismiss(): Promise<void>;
  /** Optional geometry for diagnostics; `null` when the element is not rendered. */
  boundingBox?(): Promise<BoundingBox | null>;
}

/**
 * Capabilities the helpers need from an automation engine. Lookups must not
 * wait implicitly: waiting is done by the callers of `locate`.
 */
export interface AutomationEngine {
  locate(descriptor: string): Promise<ElementHandle | null>;
  count(descriptor: string): Promise<number>;
  viewportSize?(): Promise<ViewportSize | null>;
}

/** Alternative descriptors for one logical element, most specific first. */
export type LocatorCandidate = readonly string[];

export type CandidateOutcome = "visible" | "hidden" | "absent" | "error" | "skipped";

export interface CandidateAttempt {
  index: number;
  descriptor: string;
  outcome: CandidateOutcome;
  durationMs: number;
  polls: number;
  error?: string;
}

/**
 * `found: false` means `value` is the caller's default. `rawSource` is then
 * `null`, except when the element was read but its text did not parse (a
 * price element showing "Free"): the text read is kept for diagnostics.
 */
export interface ExtractionResult<T> {
  value: T | null;
  found: boolean;
  rawSource: string | null;
}

export interface WaitCondition {
  predicate: () => boolean | Promise<boolean>;
  timeoutMs: number;
  pollIntervalMs: number;
}
