/**
 * Seeded random number generation.
 *
 * Replaces Math.random() wherever a run must be reproducible:
 * same seed, same sequence, same optimizer trajectory.
 */

export interface DeterministicRNG {
  /**
   * Next random number in [0, 1)
   */
  next(): number;

  /**
   * Next standard normal sample
   */
  nextNormal(): number;
}

/**
 * mulberry32 generator with Box-Muller normals.
 */
export class SeededRNG implements DeterministicRNG {
  private state: number;
  private spare: number | null = null;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextNormal(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }

    let u = 0;
    while (u === 0) {
      u = this.next();
    }
    const v = this.next();
    const radius = Math.sqrt(-2 * Math.log(u));
    this.spare = radius * Math.sin(2 * Math.PI * v);
    return radius * Math.cos(2 * Math.PI * v);
  }
}
