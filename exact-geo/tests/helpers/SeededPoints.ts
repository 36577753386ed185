import prand from 'pure-rand';
import type { RandomGenerator } from 'pure-rand';
import type { Point, Segment } from '../../src/types/index.js';

/**
 * Seeded generator of integer points and segments for property checks.
 * The same seed always yields the same sequence.
 *
 * @example
 * ```typescript
 * const gen = new SeededPoints(12345);
 * const seg = gen.segment(-20, 20);
 * ```
 */
export class SeededPoints {
  private rng: RandomGenerator;

  constructor(seed: number) {
    this.rng = prand.xoroshiro128plus(seed);
  }

  /**
   * Next integer in range [min, max]
   */
  intRange(min: number, max: number): number {
    const [value, next] = prand.uniformIntDistribution(min, max)(this.rng);
    this.rng = next;
    return value;
  }

  /**
   * Point with both coordinates in [min, max]
   */
  point(min: number, max: number): Point<bigint> {
    return {
      x: BigInt(this.intRange(min, max)),
      y: BigInt(this.intRange(min, max)),
    };
  }

  /**
   * Segment whose endpoints differ
   */
  segment(min: number, max: number): Segment<bigint> {
    const first = this.point(min, max);
    let second = this.point(min, max);
    while (second.x === first.x && second.y === first.y) {
      second = this.point(min, max);
    }
    return { first, second };
  }
}
