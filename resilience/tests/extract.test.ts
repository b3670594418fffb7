import { describe, expect, it } from "vitest";
import {
  InvalidArgumentError,
  NotFoundError,
  VirtualClock,
  extract,
  extractAttribute,
  extractElementPrice,
  extractText,
  silentLogger,
} from "../src";
import { FakeEngine } from "./_helpers/fakeEngine";

class EngineTimeout extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

describe("extract", () => {
  it("returns the operation value with its raw source", async () => {
    const result = await extract(
      (context) => {
        context.captureRaw(" 42 items ");
        return 42;
      },
      0,
      1000,
      { clock: new VirtualClock(), logger: silentLogger },
    );

    expect(result).toEqual({ value: 42, found: true, rawSource: " 42 items " });
  });

  it("falls back to the default when the element is missing", async () => {
    const result = await extract(
      () => {
        throw new NotFoundError({ candidates: ["#a"], attempts: [], elapsedMs: 0 });
      },
      "fallback",
      1000,
      { clock: new VirtualClock(), logger: silentLogger },
    );

    expect(result).toEqual({ value: "fallback", found: false, rawSource: null });
  });

  it("falls back to the default when the operation outlives the timeout", async () => {
    const clock = new VirtualClock();

    const result = await extract(
      async (context) => {
        await clock.sleep(10_000, context.signal);
        return "late";
      },
      "fallback",
      500,
      { clock, logger: silentLogger },
    );

    expect(result).toEqual({ value: "fallback", found: false, rawSource: null });
    expect(clock.now()).toBe(500);
  });

  it("treats engine timeout errors as absence", async () => {
    const result = await extract(
      () => {
        throw new EngineTimeout("locator.textContent: Timeout 500ms exceeded.");
      },
      "",
      1000,
      { clock: new VirtualClock(), logger: silentLogger },
    );

    expect(result.found).toBe(false);
  });

  it("re-throws failures that are not about absence", async () => {
    const broken = new Error("selector syntax error");

    await expect(
      extract(
        () => {
          throw broken;
        },
        "",
        1000,
        { clock: new VirtualClock(), logger: silentLogger },
      ),
    ).rejects.toBe(broken);
  });

  it("accepts an extra absence classifier", async () => {
    const result = await extract(
      () => {
        throw new Error("no such frame");
      },
      "default",
      1000,
      {
        clock: new VirtualClock(),
        logger: silentLogger,
        isAbsence: (error) => error instanceof Error && error.message === "no such frame",
      },
    );

    expect(result.value).toBe("default");
  });

  it("rejects a non-positive timeout", async () => {
    await expect(extract(() => 1, 0, 0, { logger: silentLogger })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });
});

describe("element extraction", () => {
  const options = { timeoutMs: 1000, timeoutPerCandidateMs: 300, pollIntervalMs: 100 };

  it("extracts whitespace-collapsed text from the first matching candidate", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { ".total": { text: "  Total:\n  $1,234.56  " } });

    const result = await extractText(engine, ["#total", ".total"], "", {
      ...options,
      clock,
      logger: silentLogger,
    });

    expect(result).toEqual({
      value: "Total: $1,234.56",
      found: true,
      rawSource: "  Total:\n  $1,234.56  ",
    });
  });

  it("keeps raw text when trimming is disabled", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { ".total": { text: " a  b " } });

    const result = await extractText(engine, [".total"], "", {
      ...options,
      trim: false,
      clock,
      logger: silentLogger,
    });

    expect(result.value).toBe(" a  b ");
  });

  it("returns the default when no candidate appears", async () => {
    const clock = new VirtualClock();

    const result = await extractText(new FakeEngine(clock), ["#gone"], "n/a", {
      ...options,
      clock,
      logger: silentLogger,
    });

    expect(result).toEqual({ value: "n/a", found: false, rawSource: null });
    expect(clock.now()).toBe(300);
  });

  it("reads attributes and treats a missing attribute as not found", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, { "a.next": { attributes: { href: "/page/2" } } });

    await expect(
      extractAttribute(engine, ["a.next"], "href", "", { ...options, clock, logger: silentLogger }),
    ).resolves.toEqual({ value: "/page/2", found: true, rawSource: "/page/2" });
    await expect(
      extractAttribute(engine, ["a.next"], "title", "none", { ...options, clock, logger: silentLogger }),
    ).resolves.toEqual({ value: "none", found: false, rawSource: null });
  });

  it("parses the first price in the element text", async () => {
    const clock = new VirtualClock();
    const engine = new FakeEngine(clock, {
      ".price": { text: "Price: $1,299.99 (was $1,499.00)" },
      ".free": { text: "Free" },
    });

    await expect(
      extractElementPrice(engine, [".price"], "$", { ...options, clock, logger: silentLogger }),
    ).resolves.toEqual({
      value: 1299.99,
      found: true,
      rawSource: "Price: $1,299.99 (was $1,499.00)",
    });
    await expect(
      extractElementPrice(engine, [".free"], "$", { ...options, clock, logger: silentLogger }),
    ).resolves.toEqual({ value: null, found: false, rawSource: "Free" });
  });
});
