import type { Page } from "playwright-core";
import {
  type AutomationEngine,
  type Clock,
  type Logger,
  type ResilienceConfig,
  type RetryPolicy,
  defaultConfig,
  loggerFromConfig,
  policyFromConfig,
  systemClock,
} from "@flakeproof/resilience";
import { clickAction } from "./actions/click";
import { waitForCountAction } from "./actions/count";
import { type DismissParams, dismissOptionalAction } from "./actions/dismiss";
import { type ExtractParams, extractAction } from "./actions/extract";
import { type FillParams, fillAction } from "./actions/fill";
import { type InspectParams, inspectAction } from "./actions/inspect";
import type { ActionContext } from "./actions/trace";
import { type PageLike, PlaywrightEngine } from "./engine/playwright";
import type { CountParams, TargetParams, WebStepTrace, WebTargetKind } from "./types";

export interface WebRunnerCapabilities {
  engine: string;
  selectors: WebTargetKind[];
  actions: string[];
}

export interface WebRunnerOptions {
  config?: ResilienceConfig;
  retryPolicy?: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
  actionTimeoutMs?: number;
}

/**
 * Runs resilient steps against a page the caller opened. The runner never
 * launches or closes a browser.
 */
export class WebRunner {
  private context: ActionContext;

  constructor(engine: AutomationEngine, options: WebRunnerOptions = {}) {
    const config = options.config ?? defaultConfig;
    this.context = {
      engine,
      config,
      retryPolicy: options.retryPolicy ?? policyFromConfig(config),
      clock: options.clock ?? systemClock,
      logger: options.logger ?? loggerFromConfig(config, "[web-runner]"),
    };
  }

  static forPage(page: Page | PageLike, options: WebRunnerOptions = {}): WebRunner {
    return new WebRunner(
      new PlaywrightEngine(page, { actionTimeoutMs: options.actionTimeoutMs }),
      options,
    );
  }

  async ping(): Promise<{ ok: boolean; service: string; version: string }> {
    return { ok: true, service: "web-runner", version: "0.1.0" };
  }

  async getCapabilities(): Promise<WebRunnerCapabilities> {
    return {
      engine: "playwright",
      selectors: ["web_css", "web_role", "web_label", "web_text", "web_xpath", "web_test_id"],
      actions: ["click", "fill", "extract", "dismissOptional", "waitForCount", "inspect"],
    };
  }

  async click(params: TargetParams): Promise<WebStepTrace> {
    return clickAction(this.context, params);
  }

  async fill(params: FillParams): Promise<WebStepTrace> {
    return fillAction(this.context, params);
  }

  async extract(params: ExtractParams): Promise<WebStepTrace> {
    return extractAction(this.context, params);
  }

  async dismissOptional(params: DismissParams): Promise<WebStepTrace> {
    return dismissOptionalAction(this.context, params);
  }

  async waitForCount(params: CountParams): Promise<WebStepTrace> {
    return waitForCountAction(this.context, params);
  }

  async inspect(params: InspectParams): Promise<WebStepTrace> {
    return inspectAction(this.context, params);
  }
}

export { PlaywrightEngine } from "./engine/playwright";
export type { LocatorLike, PageLike, PlaywrightEngineOptions } from "./engine/playwright";
export { renderRung, ladderCandidates, resolveTarget } from "./selector/resolve";
export type { ResolveTargetResult } from "./selector/resolve";
export type { DismissParams, ExtractParams, FillParams, InspectParams };
export type {
  CountParams,
  ElementInfoRecord,
  MatchAttempt,
  ResolvedRung,
  StepParams,
  TargetParams,
  WebStepTrace,
  WebTarget,
  WebTargetKind,
  WebTargetRung,
} from "./types";
