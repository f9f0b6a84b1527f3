/**
 * @cohort/benchmark - Random Number Utilities
 *
 * Seedable pseudo-random number generator for reproducible datasets.
 * Uses xorshift128+ seeded through splitmix64.
 */

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

function splitmix64(seed: bigint): bigint {
  let s = BigInt.asUintN(64, seed);
  s = BigInt.asUintN(64, (s ^ (s >> 30n)) * 0xbf58476d1ce4e5b9n);
  s = BigInt.asUintN(64, (s ^ (s >> 27n)) * 0x94d049bb133111ebn);
  return s ^ (s >> 31n);
}

/**
 * Seedable PRNG using xorshift128+
 */
export class SeededRandom {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - Integer seed; equal seeds give equal sequences
   */
  constructor(seed: number) {
    this.state0 = splitmix64(BigInt(seed));
    this.state1 = splitmix64(BigInt(seed) + 1n);
    // all-zero is a fixed point of xorshift
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n;
    }
  }

  /**
   * Get next random 64-bit value
   */
  private next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    const result = (s0 + s1) & MASK_64;
    this.state0 = s0;
    s1 = (s1 ^ (s1 << 23n)) & MASK_64;
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n);
    return result;
  }

  /**
   * Get random float in [0, 1)
   */
  random(): number {
    const value = this.next();
    return Number(value & 0x1FFFFFFFFFFFFFn) / 0x20000000000000;
  }

  /**
   * Get random integer in [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  /**
   * Get random float in [min, max)
   */
  float(min: number, max: number): number {
    return this.random() * (max - min) + min;
  }

  /**
   * Pick random element from a non-empty array
   */
  pick<T>(array: readonly T[]): T {
    return array[this.int(0, array.length - 1)];
  }
}

/**
 * Create random instance with specific seed
 */
export function createRandom(seed: number): SeededRandom {
  return new SeededRandom(seed);
}
