import { tryInteract } from "@flakeproof/resilience";
import { ladderCandidates, toMatchAttempts } from "../selector/resolve";
import type { TargetParams, WebStepTrace } from "../types";
import { type ActionContext, finishTrace, startTrace } from "./trace";

export interface DismissParams extends TargetParams {
  /** `click` presses the matched control, `dismiss` sends Escape to it. */
  action?: "click" | "dismiss";
}

export async function dismissOptionalAction(
  context: ActionContext,
  params: DismissParams,
): Promise<WebStepTrace> {
  const trace = startTrace(params);
  try {
    const outcome = await tryInteract(
      context.engine,
      ladderCandidates(params.target),
      params.action ?? "click",
      {
        shortTimeoutMs: params.timeout_ms ?? context.config.optional.shortTimeoutMs,
        pollIntervalMs: context.config.locate.pollIntervalMs,
        clock: context.clock,
        logger: context.logger,
      },
    );
    trace.status = outcome.status;
    trace.match_attempts = toMatchAttempts(params.target, outcome.attempts);
    if (outcome.status === "skipped_absent") {
      return finishTrace(trace, true);
    }
    const index = trace.match_attempts.findIndex((attempt) => attempt.ok);
    const rung = params.target.ladder[index];
    if (rung) {
      trace.resolved = { rung_index: index, kind: rung.kind, descriptor: outcome.descriptor };
    }
    if (outcome.status === "failed") {
      return finishTrace(trace, false, outcome.error);
    }
    return finishTrace(trace, true);
  } catch (error) {
    return finishTrace(trace, false, error);
  }
}
