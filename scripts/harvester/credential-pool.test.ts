import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CredentialPool } from "./credential-pool";
import { credential } from "./test-helpers";

const NOW = 1_000_000;

describe("CredentialPool", () => {
  const first = credential(1);
  const second = credential(2);
  let pool: CredentialPool;

  beforeEach(() => {
    pool = new CredentialPool([first, second], {
      resource: "core",
      lowWatermark: 10,
      ceiling: 5000,
      now: () => NOW,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("hands out the first credential that is not limited", () => {
    expect(pool.acquireUsable()).toBe(first);
    pool.recordResponse(first, 9, null);
    expect(pool.acquireUsable()).toBe(second);
    expect(pool.acquireUsable([first])).toBeNull();
  });

  it("limits a credential only once remaining drops below the watermark", () => {
    pool.recordResponse(first, 10, null);
    expect(pool.stateOf(first).limited).toBe(false);
    pool.recordResponse(first, 9, new Date(2_000_000));
    expect(pool.stateOf(first)).toEqual({ remaining: 9, resetAt: new Date(2_000_000), limited: true });
  });

  it("leaves state untouched when a response carried no quota", () => {
    pool.recordResponse(first, 3, null);
    pool.recordResponse(first, null, null);
    expect(pool.stateOf(first).remaining).toBe(3);
    expect(pool.stateOf(first).limited).toBe(true);
  });

  it("reads quota headers and ignores other resources", () => {
    pool.recordHeaders(first, {
      "x-ratelimit-remaining": "5",
      "x-ratelimit-reset": "2000",
      "x-ratelimit-resource": "core",
    });
    expect(pool.stateOf(first)).toEqual({ remaining: 5, resetAt: new Date(2_000_000), limited: true });

    pool.recordHeaders(second, { "x-ratelimit-remaining": "0", "x-ratelimit-resource": "search" });
    expect(pool.stateOf(second).limited).toBe(false);
  });

  it("honours Retry-After", () => {
    pool.recordHeaders(first, { "retry-after": "30" });
    expect(pool.stateOf(first)).toEqual({ remaining: 0, resetAt: new Date(NOW + 30_000), limited: true });
  });

  it("reports exhaustion, the earliest reset and recovers on resetAll", () => {
    pool.recordResponse(first, 0, new Date(3_000_000));
    expect(pool.allExhausted()).toBe(false);
    pool.recordResponse(second, 2, new Date(2_500_000));

    expect(pool.allExhausted()).toBe(true);
    expect(pool.earliestReset()).toEqual(new Date(2_500_000));
    expect(pool.totalRemaining()).toBe(2);

    pool.resetAll();
    expect(pool.allExhausted()).toBe(false);
    expect(pool.stateOf(second)).toEqual({ remaining: 5000, resetAt: null, limited: false });
    expect(pool.earliestReset()).toBeNull();
  });

  it("releases only the credentials whose reset has passed", () => {
    pool.recordResponse(first, 0, new Date(NOW - 1));
    pool.recordResponse(second, 0, new Date(NOW + 60_000));

    pool.releaseExpired();

    expect(pool.stateOf(first)).toEqual({ remaining: 5000, resetAt: null, limited: false });
    expect(pool.stateOf(second)).toEqual({ remaining: 0, resetAt: new Date(NOW + 60_000), limited: true });
  });

  it("waits out a limited credential's reset plus the margin", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const sleeper = vi.fn(async () => undefined);
    pool.recordResponse(first, 1, new Date(2_000_000));

    await pool.waitForReset(first, sleeper, 500);
    expect(sleeper).toHaveBeenCalledTimes(1);
    expect(sleeper).toHaveBeenCalledWith(1_000_500);
    expect(pool.stateOf(first).limited).toBe(false);

    await pool.waitForReset(first, sleeper, 500);
    expect(sleeper).toHaveBeenCalledTimes(1);
  });

  it("rejects credentials from outside the pool", () => {
    expect(() => pool.stateOf(credential(9))).toThrow("GITHUB_TOKEN_9 is not part of the core pool");
  });
});
