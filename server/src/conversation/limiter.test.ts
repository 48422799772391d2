import { describe, it, expect } from "vitest";
import { ConcurrencyLimiter } from "./limiter.js";

const tick = () => new Promise((r) => setTimeout(r, 10));

describe("ConcurrencyLimiter", () => {
  it("admits up to the limit and queues the rest", async () => {
    const limiter = new ConcurrencyLimiter(2);
    const r1 = await limiter.acquire();
    const r2 = await limiter.acquire();

    let thirdAdmitted = false;
    const p3 = limiter.acquire().then((release) => {
      thirdAdmitted = true;
      return release;
    });

    await tick();
    expect(thirdAdmitted).toBe(false);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.queuedCount).toBe(1);

    r1();
    const r3 = await p3;
    expect(thirdAdmitted).toBe(true);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.queuedCount).toBe(0);

    r2();
    r3();
    expect(limiter.activeCount).toBe(0);
  });

  it("ignores a second release", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const release = await limiter.acquire();
    release();
    release();
    expect(limiter.activeCount).toBe(0);
  });

  it("rejects a non-positive limit", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow("maxConcurrent must be a positive integer (got 0)");
  });
});
