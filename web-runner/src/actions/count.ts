import { waitForCount } from "@flakeproof/resilience";
import { renderRung } from "../selector/resolve";
import type { CountParams, WebStepTrace } from "../types";
import { type ActionContext, finishTrace, startTrace } from "./trace";

export async function waitForCountAction(
  context: ActionContext,
  params: CountParams,
): Promise<WebStepTrace> {
  const trace = startTrace(params);
  const descriptor = renderRung(params.rung);
  try {
    const report = await waitForCount(context.engine, descriptor, {
      expected: params.expected,
      comparison: params.comparison,
      timeoutMs: params.timeout_ms ?? context.config.wait.timeoutMs,
      pollIntervalMs: context.config.wait.pollIntervalMs,
      clock: context.clock,
      logger: context.logger,
    });
    trace.count = report.count;
    trace.resolved = { rung_index: 0, kind: params.rung.kind, descriptor };
    return finishTrace(trace, true);
  } catch (error) {
    return finishTrace(trace, false, error);
  }
}
