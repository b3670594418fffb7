import type { TargetParams, WebStepTrace } from "../types";
import { actOnTarget } from "./perform";
import type { ActionContext } from "./trace";

export type ClickParams = TargetParams;

export async function clickAction(
  context: ActionContext,
  params: ClickParams,
): Promise<WebStepTrace> {
  return actOnTarget(context, params, "click", (element) => element.click());
}
