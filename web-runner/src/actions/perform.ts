import {
  type ElementHandle,
  NotFoundError,
  isTransientAutomationError,
  retry,
} from "@flakeproof/resilience";
import { resolveTarget } from "../selector/resolve";
import type { TargetParams, WebStepTrace } from "../types";
import { type ActionContext, finishTrace, resolveOptions, startTrace } from "./trace";

/**
 * Resolves the target and runs `act` on it, re-resolving on every attempt so
 * a detached element is looked up again. Absence is not retried: the ladder
 * already waited for it.
 */
export async function actOnTarget(
  context: ActionContext,
  params: TargetParams,
  label: string,
  act: (element: ElementHandle) => Promise<void>,
): Promise<WebStepTrace> {
  const trace = startTrace(params);
  let attempts = 0;
  try {
    await retry(
      async () => {
        attempts += 1;
        const result = await resolveTarget(
          context.engine,
          params.target,
          resolveOptions(context, params.timeout_ms),
        );
        trace.match_attempts = result.match_attempts;
        if (!result.ok) {
          throw result.error;
        }
        trace.resolved = result.resolved;
        await act(result.element.element);
      },
      context.retryPolicy,
      {
        label: `${label} ${params.step_id}`,
        clock: context.clock,
        logger: context.logger,
        isRetryable: (error) =>
          !(error instanceof NotFoundError) && isTransientAutomationError(error),
      },
    );
    trace.retries = attempts - 1;
    return finishTrace(trace, true);
  } catch (error) {
    trace.retries = attempts - 1;
    return finishTrace(trace, false, error);
  }
}
