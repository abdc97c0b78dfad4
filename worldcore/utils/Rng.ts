//worldcore/utils/Rng.ts

/**
 * Uniform selection capability the drop core consumes.
 * `pickMany` samples WITH replacement: the result always has `count`
 * entries and may repeat an element, even when `list` is shorter.
 */
export interface RandomSource {
  int(min: number, maxInclusive: number): number;
  pick<T>(list: readonly T[]): T;
  pickMany<T>(list: readonly T[], count: number): T[];
}

export class Rng implements RandomSource {
  private _state: number;

  constructor(seed: string | number) {
    if (typeof seed === "number") {
      this._state = (seed >>> 0) || 1;
    } else {
      this._state = Rng.hashString(seed);
    }
  }

  private static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return (h >>> 0) || 1;
  }

  // mulberry32-style
  next(): number {
    let t = (this._state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(min: number, maxInclusive: number): number {
    if (!Number.isFinite(min) || !Number.isFinite(maxInclusive)) {
      throw new Error("Rng.int bounds must be finite numbers");
    }
    if (maxInclusive <= min) return min;
    const n = this.next();
    return min + Math.floor(n * (maxInclusive - min + 1));
  }

  pick<T>(list: readonly T[]): T {
    if (!list.length) {
      throw new Error("Rng.pick called with empty list");
    }
    return list[this.int(0, list.length - 1)];
  }

  pickMany<T>(list: readonly T[], count: number): T[] {
    const out: T[] = [];
    if (!list.length) return out;
    for (let i = 0; i < count; i++) {
      out.push(this.pick(list));
    }
    return out;
  }
}
