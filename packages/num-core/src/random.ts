const MODULUS = 2147483647;
const MULTIPLIER = 48271;

/**
 * Seeded PRNG, one instance per pricing call.
 * Park-Miller minimal standard LCG: x_n+1 = 48271 * x_n mod (2^31 - 1)
 */
export class SeededRandom {
  private state: number;
  private spare: number | null = null;

  constructor(seed: number) {
    this.state = Math.trunc(seed) % MODULUS;
    if (this.state <= 0) this.state += MODULUS - 1;
  }

  /**
   * Returns (0, 1)
   */
  next(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return this.state / MODULUS;
  }

  /**
   * Standard normal draw (Box-Muller, both branches used)
   */
  nextGaussian(): number {
    if (this.spare !== null) {
      const z = this.spare;
      this.spare = null;
      return z;
    }
    const u1 = this.next();
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;
    this.spare = radius * Math.sin(theta);
    return radius * Math.cos(theta);
  }

  normal(mean: number, std: number): number {
    return mean + std * this.nextGaussian();
  }
}
