import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  InvalidArgumentError,
  TimeoutError,
  VirtualClock,
  compareCount,
  pollUntil,
  silentLogger,
  waitFor,
  waitForCount,
  waitForValueChange,
} from "../src";
import { FakeEngine } from "./_helpers/fakeEngine";

describe("waitFor", () => {
  it("evaluates the predicate once even with a zero timeout", async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn(() => true);

    await expect(
      waitFor({ predicate, timeoutMs: 0, pollIntervalMs: 50 }, { clock, logger: silentLogger }),
    ).resolves.toEqual({ elapsedMs: 0, polls: 1 });
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it("fails a zero timeout after a single false evaluation", async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn(() => false);

    await expect(
      waitFor({ predicate, timeoutMs: 0, pollIntervalMs: 50 }, { clock, logger: silentLogger }),
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it("reports polls and elapsed time when the deadline passes", async () => {
    const clock = new VirtualClock();

    const failure = await waitFor(
      { predicate: () => false, timeoutMs: 1000, pollIntervalMs: 200 },
      { clock, logger: silentLogger },
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TimeoutError);
    if (!(failure instanceof TimeoutError)) {
      return;
    }
    expect(failure.polls).toBe(6);
    expect(failure.elapsedMs).toBe(1000);
    expect(failure.message).toBe(
      "Condition not met within timeout (timeout: 1000ms, elapsed: 1000ms, polls: 6)",
    );
  });

  it("uses a custom message prefix", async () => {
    await expect(
      waitFor(
        { predicate: () => false, timeoutMs: 10, pollIntervalMs: 10 },
        { clock: new VirtualClock(), logger: silentLogger, message: "Spinner still visible" },
      ),
    ).rejects.toThrow("Spinner still visible (timeout: 10ms, elapsed: 10ms, polls: 2)");
  });

  it("returns as soon as the predicate holds", async () => {
    const clock = new VirtualClock();

    const report = await waitFor(
      { predicate: async () => clock.now() >= 300, timeoutMs: 5000, pollIntervalMs: 100 },
      { clock, logger: silentLogger },
    );

    expect(report).toEqual({ elapsedMs: 300, polls: 4 });
  });

  it("evaluates once when the interval exceeds the timeout", async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn(() => false);

    const result = await pollUntil({ predicate, timeoutMs: 100, pollIntervalMs: 500 }, { clock });

    expect(result).toEqual({ met: false, elapsedMs: 100, polls: 1 });
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([100]);
  });

  it("fails waitFor after one evaluation when the interval exceeds the timeout", async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn(() => false);

    await expect(
      waitFor({ predicate, timeoutMs: 100, pollIntervalMs: 500 }, { clock, logger: silentLogger }),
    ).rejects.toThrow("Condition not met within timeout (timeout: 100ms, elapsed: 100ms, polls: 1)");
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it("skips the check at the deadline when the last interval does not fit", async () => {
    const clock = new VirtualClock();
    const predicate = vi.fn(() => false);

    const result = await pollUntil({ predicate, timeoutMs: 250, pollIntervalMs: 100 }, { clock });

    expect(result).toEqual({ met: false, elapsedMs: 250, polls: 3 });
    expect(clock.sleeps).toEqual([100, 100, 50]);
  });

  it("rejects a non-positive poll interval", async () => {
    await expect(
      waitFor({ predicate: () => true, timeoutMs: 10, pollIntervalMs: 0 }, { logger: silentLogger }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("propagates predicate errors", async () => {
    const broken = new Error("predicate exploded");

    await expect(
      waitFor(
        {
          predicate: () => {
            throw broken;
          },
          timeoutMs: 100,
          pollIntervalMs: 10,
        },
        { clock: new VirtualClock(), logger: silentLogger },
      ),
    ).rejects.toBe(broken);
  });

  it("stops with CancelledError when the signal aborts", async () => {
    const clock = new VirtualClock();
    const controller = new AbortController();
    let calls = 0;

    await expect(
      waitFor(
        {
          predicate: () => {
            calls += 1;
            if (calls === 2) {
              controller.abort();
            }
            return false;
          },
          timeoutMs: 1000,
          pollIntervalMs: 100,
        },
        { clock, logger: silentLogger, signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(2);
  });
});

describe("waitForValueChange", () => {
  it("returns the first value that differs from the initial read", async () => {
    const clock = new VirtualClock();
    const read = () => (clock.now() < 200 ? "loading" : "ready");

    await expect(
      waitForValueChange(read, { timeoutMs: 1000, pollIntervalMs: 100, clock, logger: silentLogger }),
    ).resolves.toBe("ready");
    expect(clock.now()).toBe(200);
  });

  it("times out with its own message", async () => {
    await expect(
      waitForValueChange(() => 1, {
        initial: 1,
        timeoutMs: 50,
        pollIntervalMs: 50,
        clock: new VirtualClock(),
        logger: silentLogger,
      }),
    ).rejects.toThrow("Value did not change within timeout (timeout: 50ms, elapsed: 50ms, polls: 2)");
  });
});

describe("waitForCount", () => {
  it("polls the engine count until the comparison holds", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, {
      ".row": [{ appearsAt: 0 }, { appearsAt: 100 }, { appearsAt: 250 }],
    });

    const report = await waitForCount(engine, ".row", {
      expected: 3,
      comparison: "atLeast",
      timeoutMs: 1000,
      pollIntervalMs: 100,
      clock,
      logger: silentLogger,
    });

    expect(report).toEqual({ elapsedMs: 300, polls: 4, count: 3 });
  });

  it("names the descriptor and comparison on timeout", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { ".row": [{}, {}] });

    await expect(
      waitForCount(engine, ".row", {
        expected: 0,
        timeoutMs: 100,
        pollIntervalMs: 100,
        clock,
        logger: silentLogger,
      }),
    ).rejects.toThrow(
      "Element count for '.row' never satisfied equal 0 (timeout: 100ms, elapsed: 100ms, polls: 2)",
    );
  });

  it.each([
    [2, 2, "equal", true],
    [3, 2, "greater", true],
    [2, 2, "greater", false],
    [1, 2, "less", true],
    [2, 2, "atLeast", true],
    [3, 2, "atMost", false],
  ] as const)("compareCount(%i, %i, %s) is %s", (actual, expected, comparison, outcome) => {
    expect(compareCount(actual, expected, comparison)).toBe(outcome);
  });
});
