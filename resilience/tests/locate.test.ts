import { describe, expect, it } from "vitest";
import {
  InvalidArgumentError,
  NotFoundError,
  VirtualClock,
  resolveAll,
  resolveFirst,
  silentLogger,
} from "../src";
import { FakeEngine } from "./_helpers/fakeEngine";

const budgets = { timeoutPerCandidateMs: 300, totalTimeoutMs: 2000, pollIntervalMs: 100 };

describe("resolveFirst", () => {
  it("walks candidates in order and records why each one was passed over", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, {
      "#hidden": { hidden: true },
      "#ok": { text: "Submit" },
    });

    const resolved = await resolveFirst(engine, ["#missing", "#hidden", "#ok"], {
      ...budgets,
      clock,
      logger: silentLogger,
    });

    expect(resolved.index).toBe(2);
    expect(resolved.descriptor).toBe("#ok");
    expect(resolved.element).toBe(engine.element("#ok"));
    expect(resolved.elapsedMs).toBe(600);
    expect(resolved.attempts).toEqual([
      { index: 0, descriptor: "#missing", outcome: "absent", durationMs: 300, polls: 4 },
      { index: 1, descriptor: "#hidden", outcome: "hidden", durationMs: 300, polls: 4 },
      { index: 2, descriptor: "#ok", outcome: "visible", durationMs: 0, polls: 1 },
    ]);
  });

  it("prefers the earlier candidate when several match", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { "#a": {}, "#b": {} });

    const resolved = await resolveFirst(engine, ["#a", "#b"], {
      ...budgets,
      clock,
      logger: silentLogger,
    });

    expect(resolved.descriptor).toBe("#a");
    expect(engine.lookups).toEqual(["#a"]);
  });

  it("waits for a candidate that appears within its budget", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { "#late": { appearsAt: 250 } });

    const resolved = await resolveFirst(engine, ["#late"], {
      timeoutPerCandidateMs: 1000,
      totalTimeoutMs: 1000,
      pollIntervalMs: 100,
      clock,
      logger: silentLogger,
    });

    expect(resolved.attempts[0]).toEqual({
      index: 0,
      descriptor: "#late",
      outcome: "visible",
      durationMs: 300,
      polls: 4,
    });
  });

  it("caps candidates by the total budget and skips the rest", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock);

    const failure = await resolveFirst(engine, ["#x", "#y", "#z"], {
      timeoutPerCandidateMs: 300,
      totalTimeoutMs: 500,
      pollIntervalMs: 100,
      clock,
      logger: silentLogger,
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(NotFoundError);
    if (!(failure instanceof NotFoundError)) {
      return;
    }
    expect(failure.candidates).toEqual(["#x", "#y", "#z"]);
    expect(failure.elapsedMs).toBe(500);
    expect(failure.message).toBe(
      [
        "No candidate resolved to a visible element after 500ms. Tried:",
        "  1. #x -> absent (300ms, 4 polls)",
        "  2. #y -> absent (200ms, 3 polls)",
        "  3. #z -> skipped (0ms, 0 polls)",
      ].join("\n"),
    );
  });

  it("records engine errors and moves on to the next candidate", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { "#fallback": {} });
    engine.failLocate("#boom", new Error("Target closed"));

    const resolved = await resolveFirst(engine, ["#boom", "#fallback"], {
      timeoutPerCandidateMs: 100,
      totalTimeoutMs: 1000,
      pollIntervalMs: 100,
      clock,
      logger: silentLogger,
    });

    expect(resolved.descriptor).toBe("#fallback");
    expect(resolved.attempts[0]).toEqual({
      index: 0,
      descriptor: "#boom",
      outcome: "error",
      durationMs: 100,
      polls: 2,
      error: "Target closed",
    });
  });

  it("rejects an empty candidate list", async () => {
    await expect(
      resolveFirst(new FakeEngine(new VirtualClock()), [], { ...budgets, logger: silentLogger }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("rejects a non-positive budget", async () => {
    await expect(
      resolveFirst(new FakeEngine(new VirtualClock()), ["#a"], {
        ...budgets,
        timeoutPerCandidateMs: 0,
        logger: silentLogger,
      }),
    ).rejects.toThrow("Invalid timeoutPerCandidateMs: must be > 0, got 0");
  });
});

describe("resolveAll", () => {
  it("returns every visible candidate in order", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { "#a": {}, "#b": {} });

    const result = await resolveAll(engine, ["#a", "#missing", "#b"], {
      ...budgets,
      clock,
      logger: silentLogger,
    });

    expect(result.matches.map((match) => [match.index, match.descriptor])).toEqual([
      [0, "#a"],
      [2, "#b"],
    ]);
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual([
      "visible",
      "absent",
      "visible",
    ]);
    expect(result.elapsedMs).toBe(300);
  });

  it("throws when nothing is visible", async () => {
    const clock = new VirtualClock();

    await expect(
      resolveAll(new FakeEngine(clock), ["#a"], { ...budgets, clock, logger: silentLogger }),
    ).rejects.toThrow("None of the candidates found visible elements after 300ms. Tried:");
  });
});
