import { inspectElement } from "@flakeproof/resilience";
import { resolveTarget } from "../selector/resolve";
import type { TargetParams, WebStepTrace } from "../types";
import { type ActionContext, finishTrace, resolveOptions, startTrace } from "./trace";

export type InspectParams = TargetParams;

/** Resolves the target and records what the page shows for it. Not retried. */
export async function inspectAction(
  context: ActionContext,
  params: InspectParams,
): Promise<WebStepTrace> {
  const trace = startTrace(params);
  try {
    const result = await resolveTarget(
      context.engine,
      params.target,
      resolveOptions(context, params.timeout_ms),
    );
    trace.match_attempts = result.match_attempts;
    if (!result.ok) {
      return finishTrace(trace, false, result.error);
    }
    trace.resolved = result.resolved;
    const info = await inspectElement(context.engine, result.element.element);
    trace.element = {
      visible: info.visible,
      text: info.text,
      attributes: info.attributes,
      box: info.box,
      in_viewport: info.inViewport,
    };
    return finishTrace(trace, true);
  } catch (error) {
    return finishTrace(trace, false, error);
  }
}
