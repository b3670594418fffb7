import {
  type AutomationEngine,
  type CandidateAttempt,
  type ResolveOptions,
  type ResolvedElement,
  NotFoundError,
  resolveFirst,
} from "@flakeproof/resilience";
import type { MatchAttempt, ResolvedRung, WebTarget, WebTargetRung } from "../types";

function quoted(value: string, exact: boolean | undefined): string {
  return `${JSON.stringify(value)}${exact ? "s" : "i"}`;
}

/**
 * Renders a rung as a Playwright selector string, the same strings
 * `getByRole`/`getByLabel`/`getByText` produce internally.
 */
export function renderRung(rung: WebTargetRung): string {
  switch (rung.kind) {
    case "web_css":
      return `css=${rung.selector.css}`;
    case "web_xpath":
      return `xpath=${rung.selector.xpath}`;
    case "web_text":
      return `internal:text=${quoted(rung.selector.text, rung.selector.exact)}`;
    case "web_label":
      return `internal:label=${quoted(rung.selector.text, rung.selector.exact)}`;
    case "web_role": {
      const { role, name, exact } = rung.selector;
      return name === undefined
        ? `internal:role=${role}`
        : `internal:role=${role}[name=${quoted(name, exact)}]`;
    }
    case "web_test_id":
      return `internal:testid=[data-testid=${quoted(rung.selector.test_id, true)}]`;
  }
}

export function ladderCandidates(target: WebTarget): string[] {
  return target.ladder.map(renderRung);
}

export function toMatchAttempts(target: WebTarget, attempts: readonly CandidateAttempt[]): MatchAttempt[] {
  return attempts.map((attempt) => {
    const match: MatchAttempt = {
      rung_index: attempt.index,
      kind: target.ladder[attempt.index]?.kind ?? "web_css",
      descriptor: attempt.descriptor,
      outcome: attempt.outcome,
      polls: attempt.polls,
      duration_ms: attempt.durationMs,
      ok: attempt.outcome === "visible",
    };
    if (attempt.error) {
      match.error = attempt.error;
    }
    return match;
  });
}

export type ResolveTargetResult =
  | { ok: true; element: ResolvedElement; resolved: ResolvedRung; match_attempts: MatchAttempt[] }
  | { ok: false; error: NotFoundError; match_attempts: MatchAttempt[] };

/** Walks the ladder in order; absence comes back as a value so traces keep the attempts. */
export async function resolveTarget(
  engine: AutomationEngine,
  target: WebTarget,
  options: ResolveOptions,
): Promise<ResolveTargetResult> {
  try {
    const element = await resolveFirst(engine, ladderCandidates(target), options);
    const rung = target.ladder[element.index];
    return {
      ok: true,
      element,
      resolved: {
        rung_index: element.index,
        kind: rung?.kind ?? "web_css",
        descriptor: element.descriptor,
      },
      match_attempts: toMatchAttempts(target, element.attempts),
    };
  } catch (error) {
    if (error instanceof NotFoundError) {
      return { ok: false, error, match_attempts: toMatchAttempts(target, error.attempts) };
    }
    throw error;
  }
}
