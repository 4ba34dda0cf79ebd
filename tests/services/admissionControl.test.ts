import { describe, expect, it } from "vitest";
import { FixedWindowLimiter, retryAfterSeconds } from "../../src/services/business/admissionControl.js";

function manualClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("FixedWindowLimiter", () => {
  it("admits the limit within a window and rejects the next request", () => {
    const clock = manualClock();
    const limiter = new FixedWindowLimiter(3, 60_000, clock.now);

    expect([1, 2, 3].map(() => limiter.allow("10.0.0.1").remaining)).toEqual([2, 1, 0]);

    clock.advance(10_000);
    const rejected = limiter.allow("10.0.0.1");
    expect(rejected.allowed).toBe(false);
    expect(rejected.retryAfterMs).toBe(50_000);
    expect(rejected.retryAfterMs).toBeLessThanOrEqual(60_000);
  });

  it("admits again once the window has elapsed", () => {
    const clock = manualClock();
    const limiter = new FixedWindowLimiter(3, 60_000, clock.now);
    for (let i = 0; i < 4; i++) {
      limiter.allow("k");
    }

    clock.advance(60_001);

    expect(limiter.allow("k")).toMatchObject({ allowed: true, remaining: 2 });
  });

  it("counts each client separately", () => {
    const limiter = new FixedWindowLimiter(1, 60_000, manualClock().now);

    expect(limiter.allow("a").allowed).toBe(true);
    expect(limiter.allow("b").allowed).toBe(true);
    expect(limiter.allow("a").allowed).toBe(false);
  });

  it("evicts expired windows at most once per window width", () => {
    const clock = manualClock();
    const limiter = new FixedWindowLimiter(5, 1_000, clock.now);
    limiter.allow("a");
    clock.advance(500);
    limiter.allow("x");

    clock.advance(501);
    limiter.allow("c");
    expect(limiter.size).toBe(2); // a evicted, x still inside its window

    clock.advance(600); // x has expired, but the last scan was only 600ms ago
    limiter.allow("d");
    expect(limiter.size).toBe(3);
  });

  it("reports the remaining wait for a throttled key", () => {
    const clock = manualClock();
    const limiter = new FixedWindowLimiter(1, 60_000, clock.now);
    limiter.allow("k");
    clock.advance(15_000);

    expect(limiter.retryAfterMs("k")).toBe(45_000);
    expect(limiter.retryAfterMs("other")).toBe(0);
  });

  it("releases and resets admissions", () => {
    const limiter = new FixedWindowLimiter(1, 60_000, manualClock().now);
    limiter.allow("k");
    limiter.release("k");
    expect(limiter.allow("k").allowed).toBe(true);

    limiter.reset("k");
    expect(limiter.size).toBe(0);
  });

  it("rejects a non-positive configuration", () => {
    expect(() => new FixedWindowLimiter(0, 60_000)).toThrow();
  });
});

describe("retryAfterSeconds", () => {
  it("rounds to whole seconds with a floor of one", () => {
    expect(retryAfterSeconds(59_600)).toBe(60);
    expect(retryAfterSeconds(1_400)).toBe(1);
    expect(retryAfterSeconds(200)).toBe(1);
    expect(retryAfterSeconds(0)).toBe(1);
  });
});
