import { describe, expect, it } from "vitest";

import { defaultReleaseConfig } from "../core/config.js";

import { RetryExhaustedError, linearBackoffPolicy, runWithRetries, uploadRetryPolicy } from "./retry.js";

describe("uploadRetryPolicy", () => {
  it("grows the delay with each attempt from the configured defaults", () => {
    const policy = uploadRetryPolicy(defaultReleaseConfig().upload);
    expect([1, 2, 3].map((attempt) => policy.backoffMs(attempt))).toEqual([200, 400, 600]);
    expect(policy.maxAttempts).toBe(3);
  });

  it("follows a configured override", () => {
    const policy = uploadRetryPolicy({ max_attempts: 5, backoff_ms: 50 });
    expect(policy.maxAttempts).toBe(5);
    expect(policy.backoffMs(4)).toBe(200);
  });
});

describe("runWithRetries", () => {
  it("returns the first successful result", async () => {
    const sleeps: number[] = [];
    let calls = 0;

    const result = await runWithRetries(
      linearBackoffPolicy(3, 10),
      async (attempt) => {
        calls += 1;
        if (attempt < 2) throw new Error("flaky");
        return "ok";
      },
      { sleep: async (ms) => void sleeps.push(ms) },
    );

    expect(result).toBe("ok");
    expect(calls).toBe(2);
    expect(sleeps).toEqual([10]);
  });

  it("stops at the attempt bound without sleeping after the last failure", async () => {
    const sleeps: number[] = [];
    const retries: number[] = [];
    let calls = 0;

    const err = await runWithRetries(
      linearBackoffPolicy(3, 200),
      async () => {
        calls += 1;
        throw new Error(`boom ${calls}`);
      },
      {
        sleep: async (ms) => void sleeps.push(ms),
        onRetry: ({ attempt }) => retries.push(attempt),
      },
    ).catch((error: unknown) => error);

    expect(calls).toBe(3);
    expect(sleeps).toEqual([200, 400]);
    expect(retries).toEqual([1, 2]);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toHaveProperty("attempts", 3);
    expect(err).toHaveProperty("message", "Gave up after 3 attempts: boom 3");
  });
});
