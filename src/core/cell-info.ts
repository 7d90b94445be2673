import { WangId, WANG_INDEX_COUNT, wrapIndex } from './wang-id.js';

/**
 * Constraints for one cell of a fill: the desired color at each wang index,
 * plus a mask of indices the chosen tile must match exactly.
 */
export class CellInfo {
  readonly desired: WangId;
  readonly mask: boolean[];

  constructor(desired?: WangId, mask?: readonly boolean[]) {
    this.desired = desired ? new WangId(desired.colors) : WangId.wildcard();
    this.mask = mask ? [...mask] : new Array<boolean>(WANG_INDEX_COUNT).fill(false);
  }

  /** Hard constraint. Always overwrites, including an earlier constraint. */
  setConstraint(index: number, color: number): void {
    this.desired.setIndexColor(index, color);
    this.mask[wrapIndex(index)] = true;
  }

  /** Soft preference. Ignored where the index is already hard-constrained. */
  setPreference(index: number, color: number): void {
    if (this.isConstrained(index)) return;
    this.desired.setIndexColor(index, color);
  }

  isConstrained(index: number): boolean {
    return this.mask[wrapIndex(index)];
  }

  /** True if any masked index disagrees with the tile (a desired 0 never counts) */
  isViolatedBy(tileWangId: WangId): boolean {
    for (let i = 0; i < WANG_INDEX_COUNT; i++) {
      if (!this.mask[i]) continue;
      const want = this.desired.indexColor(i);
      if (want !== 0 && want !== tileWangId.indexColor(i)) return true;
    }
    return false;
  }

  clone(): CellInfo {
    return new CellInfo(this.desired, this.mask);
  }
}
