/**
 * Seeded linear congruential generator.
 * Same seed, same sequence: optimizer runs can be replayed exactly.
 */
const MODULUS = 2147483648;
const MULTIPLIER = 1103515245;
const INCREMENT = 12345;

export class SeededRandom {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = Math.abs(Math.floor(seed)) % MODULUS;
  }

  /**
   * Uniform float in [0, 1)
   */
  next(): number {
    // Split the product so it stays within exact double range
    const high = Math.floor(this.state / 65536);
    const low = this.state % 65536;
    this.state = (((MULTIPLIER * high) % MODULUS) * 65536 + MULTIPLIER * low + INCREMENT) % MODULUS;
    return this.state / MODULUS;
  }

  /**
   * Uniformly pick one element of a non-empty list
   */
  pick<T>(values: readonly T[]): T {
    if (values.length === 0) {
      throw new Error("Cannot pick from an empty list");
    }
    return values[Math.floor(this.next() * values.length)];
  }
}
