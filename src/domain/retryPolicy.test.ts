import { RetryPolicy, backoffDelayMs, hasAttemptsLeft } from "./retryPolicy";

describe("backoffDelayMs", () => {
  const policy: RetryPolicy = { maxAttempts: 5, backoffBaseMs: 500, backoffCapMs: 60_000 };

  it("should keep half the exponential delay fixed and jitter the rest", () => {
    expect(backoffDelayMs(policy, 1, () => 0)).toBe(250);
    expect(backoffDelayMs(policy, 1, () => 1)).toBe(500);
    expect(backoffDelayMs(policy, 3, () => 0.5)).toBe(1500);
  });

  it("should never exceed the cap", () => {
    expect(backoffDelayMs(policy, 20, () => 0)).toBe(30_000);
    expect(backoffDelayMs(policy, 20, () => 1)).toBe(60_000);
  });
});

describe("hasAttemptsLeft", () => {
  it("should allow attempts up to maxAttempts", () => {
    const policy: RetryPolicy = { maxAttempts: 3, backoffBaseMs: 1, backoffCapMs: 1 };

    expect(hasAttemptsLeft(policy, 1)).toBe(true);
    expect(hasAttemptsLeft(policy, 2)).toBe(true);
    expect(hasAttemptsLeft(policy, 3)).toBe(false);
  });
});
