/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * Used to scatter reproducible obstacles in tests and benchmarks.
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

export class SeededRandom {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s0 = mix();
    this.s1 = mix();
    this.s2 = mix();
    this.s3 = mix();

    // xoshiro requires at least one non-zero word
    if ((this.s0 | this.s1 | this.s2 | this.s3) === 0) {
      this.s0 = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const result = (rotl((this.s0 + this.s3) >>> 0, 7) + this.s0) >>> 0;
    const t = (this.s1 << 9) >>> 0;

    this.s2 = (this.s2 ^ this.s0) >>> 0;
    this.s3 = (this.s3 ^ this.s1) >>> 0;
    this.s1 = (this.s1 ^ this.s2) >>> 0;
    this.s0 = (this.s0 ^ this.s3) >>> 0;

    this.s2 = (this.s2 ^ t) >>> 0;
    this.s3 = rotl(this.s3, 11);

    return result;
  }

  /**
   * Next random number in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  probability(chance: number): boolean {
    return this.next() < chance;
  }
}
