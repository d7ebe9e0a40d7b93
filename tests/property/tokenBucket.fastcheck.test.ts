import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { TokenBucketLimiter } from "../../src/infra/tokenBucket.js";

/**
 * Property-based coverage of the limiter arithmetic: the balance never leaves
 * `[0, capacity]` and admissions never exceed what the bucket could have
 * accumulated.
 */
describe("token bucket limiter (property-based)", () => {
  it("admits exactly min(calls, capacity) when the clock stands still", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 25 }), fc.integer({ min: 0, max: 60 }), (capacity, calls) => {
        const limiter = new TokenBucketLimiter({ capacity, refillIntervalMs: 60_000, now: () => 0 });
        let admitted = 0;
        for (let index = 0; index < calls; index += 1) {
          if (limiter.admit("tool").admitted) {
            admitted += 1;
          }
        }
        expect(admitted).to.equal(Math.min(calls, capacity));
      }),
    );
  });

  it("never admits more than the capacity plus the refilled tokens", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 10 }),
        fc.integer({ min: 100, max: 5_000 }),
        fc.array(fc.integer({ min: 0, max: 400 }), { maxLength: 80 }),
        (capacity, refillIntervalMs, steps) => {
          let now = 0;
          const limiter = new TokenBucketLimiter({ capacity, refillIntervalMs, now: () => now });
          let admitted = 0;
          for (const step of steps) {
            now += step;
            if (limiter.admit("tool").admitted) {
              admitted += 1;
            }
            const tokens = limiter.inspect("tool")?.tokens ?? capacity;
            expect(tokens).to.be.at.least(0);
            expect(tokens).to.be.at.most(capacity);
          }
          const refilled = (now / refillIntervalMs) * capacity;
          expect(admitted).to.be.at.most(Math.floor(capacity + refilled + 1e-9));
        },
      ),
    );
  });

  it("keeps keys independent", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 0, max: 30 }), (capacity, drained) => {
        const limiter = new TokenBucketLimiter({ capacity, refillIntervalMs: 1_000, now: () => 0 });
        for (let index = 0; index < drained; index += 1) {
          limiter.admit("noisy");
        }
        expect(limiter.admit("quiet").admitted).to.equal(true);
      }),
    );
  });
});
