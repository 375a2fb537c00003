import { describe, it } from "node:test";
import assert from "node:assert";
import { RateLimiter } from "./rate-limiter.js";

function clock(start = 1_700_000_000_000) {
  let t = start;
  return { now: () => t, advance: (ms: number) => { t += ms; } };
}

describe("RateLimiter", () => {
  it("admits up to max per window, then refuses", () => {
    const c = clock();
    const rl = new RateLimiter({ max: 5, now: c.now });
    for (let i = 0; i < 5; i++) {
      assert.strictEqual(rl.allow("chat-1"), true, `admission ${i + 1}`);
      c.advance(60_000);
    }
    assert.strictEqual(rl.allow("chat-1"), false);
  });

  it("keeps submitters independent", () => {
    const c = clock();
    const rl = new RateLimiter({ max: 1, now: c.now });
    assert.strictEqual(rl.allow("a"), true);
    assert.strictEqual(rl.allow("a"), false);
    assert.strictEqual(rl.allow("b"), true);
  });

  it("admits again once the oldest admission leaves the window", () => {
    const c = clock();
    const rl = new RateLimiter({ max: 2, windowSeconds: 3600, now: c.now });
    assert.ok(rl.allow("a"));
    c.advance(1000);
    assert.ok(rl.allow("a"));
    c.advance(3599_000);
    // first stamp is now exactly windowMs old and no longer counts
    assert.strictEqual(rl.allow("a"), true);
    assert.strictEqual(rl.allow("a"), false);
  });

  it("does not record refused attempts", () => {
    const c = clock();
    const rl = new RateLimiter({ max: 1, windowSeconds: 10, now: c.now });
    assert.ok(rl.allow("a"));
    c.advance(5_000);
    assert.strictEqual(rl.allow("a"), false);
    c.advance(5_000);
    assert.strictEqual(rl.allow("a"), true);
  });

  it("sweep drops idle submitters only", () => {
    const c = clock();
    const rl = new RateLimiter({ max: 3, windowSeconds: 60, now: c.now });
    rl.allow("idle");
    c.advance(61_000);
    rl.allow("busy");
    assert.strictEqual(rl.size(), 2);
    assert.strictEqual(rl.sweep(), 1);
    assert.strictEqual(rl.size(), 1);
  });
});
