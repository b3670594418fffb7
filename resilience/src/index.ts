export { systemClock, VirtualClock } from "./clock";
export type { Clock } from "./clock";
export {
  ResilienceError,
  TransientFailure,
  PermanentFailure,
  NotFoundError,
  TimeoutError,
  InvalidArgumentError,
  CancelledError,
  errorMessage,
  isResilienceError,
} from "./errors";
export type { ResilienceErrorCode } from "./errors";
export type {
  AutomationEngine,
  BoundingBox,
  ElementHandle,
  ViewportSize,
  LocatorCandidate,
  CandidateOutcome,
  CandidateAttempt,
  ExtractionResult,
  WaitCondition,
} from "./types";

export { ConsoleLogger, silentLogger, defaultLogger, createLogger } from "./logging/logger";
export type { Logger, LogLevel, ConsoleLoggerOptions } from "./logging/logger";

export {
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  validateRetryPolicy,
  computeDelay,
  sampleDelay,
  backoffSchedule,
} from "./retry/policy";
export type { RetryPolicy } from "./retry/policy";
export { retry, withRetry, retryUntil, getRetryDiagnostics } from "./retry/retry";
export type { RetryOptions, RetryUntilOptions, RetryDiagnostics } from "./retry/retry";
export { classifyFailure, isTransientAutomationError } from "./retry/classify";
export type { ClassifiedFailure, FailureClassification } from "./retry/classify";

export { pollUntil, waitFor, waitForValueChange, validateCondition } from "./wait/waitFor";
export type { WaitOptions, WaitReport, PollResult, ValueChangeOptions } from "./wait/waitFor";

export { resolveFirst, resolveAll, DEFAULT_PROBE_INTERVAL_MS } from "./locate/resolve";
export type { ResolveOptions, ResolvedElement, ResolvedMatch, ResolvedAll } from "./locate/resolve";
export { waitForCount, compareCount } from "./locate/count";
export type { CountComparison, CountOptions, CountReport } from "./locate/count";

export { extract, isAbsenceFailure, notFound } from "./extract/safeExtract";
export type { ExtractionContext, ExtractOptions } from "./extract/safeExtract";
export { extractText, extractAttribute, extractElementPrice } from "./extract/elements";
export type { ElementExtractOptions } from "./extract/elements";

export {
  extractPriceMatch,
  extractPrice,
  extractNumber,
  extractNumbers,
  parsePrice,
  formatCurrency,
  sanitizeText,
  truncateText,
  removeSpecialCharacters,
  extractEmail,
  extractUrl,
} from "./text/normalize";
export type {
  PriceOptions,
  SymbolPosition,
  DecimalSeparator,
  SanitizeOptions,
} from "./text/normalize";

export { inspectElement, isBoxInViewport, INFO_ATTRIBUTES } from "./inspect/elementInfo";
export type { ElementInfo } from "./inspect/elementInfo";

export { tryInteract, DEFAULT_SHORT_TIMEOUT_MS } from "./interact/optional";
export type {
  InteractionAction,
  InteractionOutcome,
  OptionalInteractionOptions,
} from "./interact/optional";

export {
  defaultConfig,
  parseConfig,
  loadConfig,
  policyFromConfig,
  loggerFromConfig,
} from "./config/defaults";
export type { ResilienceConfig, ConfigFile } from "./config/defaults";
