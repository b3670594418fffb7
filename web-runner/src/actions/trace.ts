import {
  type AutomationEngine,
  type Clock,
  type Logger,
  type ResilienceConfig,
  type ResolveOptions,
  type RetryPolicy,
  errorMessage,
  isResilienceError,
} from "@flakeproof/resilience";
import type { StepParams, WebStepTrace } from "../types";

export interface ActionContext {
  engine: AutomationEngine;
  config: ResilienceConfig;
  retryPolicy: RetryPolicy;
  clock: Clock;
  logger: Logger;
}

export function startTrace(params: StepParams): WebStepTrace {
  return {
    run_id: params.run_id,
    step_id: params.step_id,
    started_at: new Date().toISOString(),
    ended_at: "",
    ok: false,
    match_attempts: [],
  };
}

export function finishTrace(trace: WebStepTrace, ok: boolean, error?: unknown): WebStepTrace {
  trace.ended_at = new Date().toISOString();
  trace.ok = ok;
  if (error !== undefined) {
    trace.error = errorMessage(error);
    if (isResilienceError(error)) {
      trace.error_code = error.code;
    }
  }
  return trace;
}

/** Locate budgets for one step; `timeout_ms` overrides the per-rung wait. */
export function resolveOptions(context: ActionContext, timeoutMs?: number): ResolveOptions {
  const locate = context.config.locate;
  return {
    timeoutPerCandidateMs: timeoutMs ?? locate.timeoutPerCandidateMs,
    totalTimeoutMs: locate.totalTimeoutMs,
    pollIntervalMs: locate.pollIntervalMs,
    clock: context.clock,
    logger: context.logger,
  };
}
