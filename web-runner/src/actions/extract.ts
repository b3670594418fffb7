import { extract, sanitizeText } from "@flakeproof/resilience";
import { resolveTarget } from "../selector/resolve";
import type { TargetParams, WebStepTrace } from "../types";
import { type ActionContext, finishTrace, resolveOptions, startTrace } from "./trace";

export type ExtractParams = TargetParams & {
  default_value?: string | null;
} & ({ field?: "text" } | { field: "attribute"; attribute: string });

/**
 * Reads text or an attribute from the target. A missing element is not a
 * failed step: the trace carries `found: false` and the default value.
 * `timeout_ms` bounds the whole extraction, not each rung.
 */
export async function extractAction(
  context: ActionContext,
  params: ExtractParams,
): Promise<WebStepTrace> {
  const trace = startTrace(params);
  const defaultValue = params.default_value ?? null;
  try {
    const result = await extract<string | null>(
      async (extraction) => {
        const resolved = await resolveTarget(context.engine, params.target, {
          ...resolveOptions(context),
          totalTimeoutMs: Math.max(1, extraction.deadline - context.clock.now()),
          signal: extraction.signal,
        });
        trace.match_attempts = resolved.match_attempts;
        if (!resolved.ok) {
          throw resolved.error;
        }
        trace.resolved = resolved.resolved;
        const element = resolved.element.element;
        if (params.field === "attribute") {
          return element.attribute(params.attribute);
        }
        return sanitizeText(await element.text());
      },
      defaultValue,
      params.timeout_ms ?? context.config.extract.timeoutMs,
      { clock: context.clock, logger: context.logger, label: `extract ${params.step_id}` },
    );
    trace.found = result.found && result.value !== null;
    trace.value = trace.found ? result.value : defaultValue;
    return finishTrace(trace, true);
  } catch (error) {
    return finishTrace(trace, false, error);
  }
}
