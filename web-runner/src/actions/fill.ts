import type { TargetParams, WebStepTrace } from "../types";
import { actOnTarget } from "./perform";
import type { ActionContext } from "./trace";

export interface FillParams extends TargetParams {
  value: string;
}

export async function fillAction(
  context: ActionContext,
  params: FillParams,
): Promise<WebStepTrace> {
  return actOnTarget(context, params, "fill", (element) => element.fill(params.value));
}
