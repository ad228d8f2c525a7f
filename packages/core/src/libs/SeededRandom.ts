/**
 * Deterministic xorshift32 generator, so randomized games can be replayed
 * from their seed. String seeds are hashed to 32 bits.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: string | number) {
    const state = typeof seed === "number" ? seed >>> 0 : hashString(seed);
    // xorshift is stuck at 0
    this.state = state === 0 ? 1 : state;
  }

  /** Next unsigned 32-bit value */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor((this.next() / 4294967296) * max);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error("Cannot pick from an empty list");
    }
    return items[this.nextInt(items.length)];
  }

  /** Fisher-Yates, in place */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }
}

function hashString(s: string): number {
  let hash = 0;
  for (let i = 0; i < s.length; i++) {
    hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}
