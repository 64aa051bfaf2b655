/**
 * Tie-break keys from a fixed seed.
 *
 * A multiplicative congruential generator over the prime 2^31 - 1: one seed
 * always replays one key sequence, so two evaluation runs that share a seed
 * rank tied items identically.
 */

const MODULUS = 2_147_483_647;
const MULTIPLIER = 48_271;
/** Number of distinct non-zero states. */
const PERIOD = MODULUS - 1;

/** Fold any integer seed onto a non-zero state; zero would stay zero forever. */
function initialState(seed: number): number {
  return (((seed % PERIOD) + PERIOD) % PERIOD) + 1;
}

export class SeededRng {
  private state: number;

  constructor(readonly seed: number) {
    this.state = initialState(seed);
  }

  /** Next key in [0, 1). */
  next(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return (this.state - 1) / PERIOD;
  }

  /** One key per item. */
  drawKeys(count: number): number[] {
    return Array.from({ length: count }, () => this.next());
  }
}
