/** Uniform floats in [0, 1) */
export interface RandomSource {
  next(): number;
}

/** Deterministic PRNG (mulberry32). Every fill owns its own instance. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Seed from a 64-bit value. High and low words are folded together and
   * mixed, so seeds that differ only in their high word still diverge.
   */
  static fromSeed64(seed: bigint): SeededRandom {
    const low = Number(BigInt.asUintN(32, seed));
    const high = Number(BigInt.asUintN(32, seed >> 32n));
    let h = Math.imul(high ^ 0x9e3779b9, 0x85ebca6b) ^ low;
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return new SeededRandom(h);
  }

  /** Float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max) */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min));
  }
}
