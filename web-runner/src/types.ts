import type { CandidateOutcome, CountComparison } from "@flakeproof/resilience";

export type WebTargetRung =
  | { kind: "web_css"; selector: { css: string }; notes?: string }
  | {
      kind: "web_role";
      selector: { role: string; name?: string; exact?: boolean };
      notes?: string;
    }
  | { kind: "web_label"; selector: { text: string; exact?: boolean }; notes?: string }
  | { kind: "web_text"; selector: { text: string; exact?: boolean }; notes?: string }
  | { kind: "web_xpath"; selector: { xpath: string }; notes?: string }
  | { kind: "web_test_id"; selector: { test_id: string }; notes?: string };

export type WebTargetKind = WebTargetRung["kind"];

/** Ordered fallbacks for one logical element, most specific rung first. */
export interface WebTarget {
  ladder: WebTargetRung[];
}

export interface MatchAttempt {
  rung_index: number;
  kind: WebTargetKind;
  descriptor: string;
  outcome: CandidateOutcome;
  polls: number;
  duration_ms: number;
  ok: boolean;
  error?: string;
}

export interface ResolvedRung {
  rung_index: number;
  kind: WebTargetKind;
  descriptor: string;
}

export interface ElementInfoRecord {
  visible: boolean;
  text: string;
  attributes: Record<string, string>;
  box: { x: number; y: number; width: number; height: number } | null;
  in_viewport: boolean | null;
}

export interface WebStepTrace {
  run_id: string;
  step_id: string;
  started_at: string;
  ended_at: string;
  ok: boolean;
  match_attempts: MatchAttempt[];
  resolved?: ResolvedRung;
  error?: string;
  error_code?: string;
  value?: string | null;
  found?: boolean;
  status?: "performed" | "skipped_absent" | "failed";
  count?: number;
  retries?: number;
  element?: ElementInfoRecord;
}

export interface StepParams {
  run_id: string;
  step_id: string;
}

export interface TargetParams extends StepParams {
  target: WebTarget;
  timeout_ms?: number;
}

export interface CountParams extends StepParams {
  rung: WebTargetRung;
  expected: number;
  comparison?: CountComparison;
  timeout_ms?: number;
}
