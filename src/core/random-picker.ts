import type { RandomSource } from './seeded-random.js';

/** Weighted random selection among equally-scored candidates */
export class RandomPicker<T> {
  private items: Array<{ value: T; weight: number }> = [];
  private total = 0;

  add(value: T, weight = 1.0): void {
    this.total += weight;
    this.items.push({ value, weight });
  }

  /**
   * Draw r in [0, total) and walk the items in insertion order, subtracting
   * each weight until r drops to 0 or below.
   */
  pick(rng: RandomSource): T | undefined {
    if (this.items.length === 0) return undefined;
    if (this.items.length === 1) return this.items[0].value;
    if (this.total <= 0) return this.items[0].value;

    let r = rng.next() * this.total;
    for (const item of this.items) {
      r -= item.weight;
      if (r <= 0) return item.value;
    }
    return this.items[this.items.length - 1].value;
  }

  values(): T[] {
    return this.items.map(item => item.value);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  clear(): void {
    this.items = [];
    this.total = 0;
  }

  get size(): number {
    return this.items.length;
  }
}
