import { MAX_SEED } from "@servicemap/schemas";

/** Source of randomness threaded explicitly through synthesis. */
export interface RandomSource {
  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
  pick<T>(items: readonly T[]): T;
}

// Seeds 1..MAX_SEED are their own state; xorshift32 has a fixed point at zero.
const ZERO_SEED_STATE = 0xffff_ffff;

export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new RangeError(`seed must be an integer in [0, ${MAX_SEED}] (got ${seed})`);
    }
    this.state = seed === 0 ? ZERO_SEED_STATE : seed;
  }

  /** xorshift32 */
  private nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    // [0, 1)
    return this.nextU32() / 0x1_0000_0000;
  }

  nextInt(maxExclusive: number): number {
    const m = Math.trunc(maxExclusive);
    if (!Number.isFinite(m) || m <= 0) {
      throw new RangeError("nextInt(maxExclusive) requires maxExclusive > 0");
    }
    return Math.floor(this.nextFloat() * m);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError("pick(items) requires a non-empty array");
    const item = items[this.nextInt(items.length)];
    if (item === undefined) throw new RangeError("pick(items) drew an empty slot");
    return item;
  }
}
