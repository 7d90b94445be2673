import { describe, it, expect } from 'vitest';
import { CellInfo } from '../../src/core/cell-info.js';
import { WangId, WangIndex } from '../../src/core/wang-id.js';

describe('CellInfo', () => {
  it('starts with no preferences and no constraints', () => {
    const cell = new CellInfo();
    expect(cell.desired.toArray()).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(cell.mask).toEqual([false, false, false, false, false, false, false, false]);
  });

  it('setConstraint sets color and mask', () => {
    const cell = new CellInfo();
    cell.setConstraint(WangIndex.TopRight, 2);
    expect(cell.desired.indexColor(WangIndex.TopRight)).toBe(2);
    expect(cell.isConstrained(WangIndex.TopRight)).toBe(true);
    expect(cell.isConstrained(WangIndex.Top)).toBe(false);
  });

  it('setConstraint overwrites an earlier constraint', () => {
    const cell = new CellInfo();
    cell.setConstraint(WangIndex.Left, 1);
    cell.setConstraint(WangIndex.Left, 3);
    expect(cell.desired.indexColor(WangIndex.Left)).toBe(3);
  });

  it('setConstraint wraps the index', () => {
    const cell = new CellInfo();
    cell.setConstraint(9, 2);
    expect(cell.mask[1]).toBe(true);
    expect(cell.desired.indexColor(1)).toBe(2);
  });

  it('setPreference writes only unmasked indices', () => {
    const cell = new CellInfo();
    cell.setConstraint(WangIndex.Top, 1);
    cell.setPreference(WangIndex.Top, 2);
    cell.setPreference(WangIndex.Bottom, 2);
    expect(cell.desired.indexColor(WangIndex.Top)).toBe(1);
    expect(cell.desired.indexColor(WangIndex.Bottom)).toBe(2);
    expect(cell.isConstrained(WangIndex.Bottom)).toBe(false);
  });

  it('preferences overwrite earlier preferences', () => {
    const cell = new CellInfo();
    cell.setPreference(WangIndex.Right, 1);
    cell.setPreference(WangIndex.Right, 2);
    expect(cell.desired.indexColor(WangIndex.Right)).toBe(2);
  });

  describe('isViolatedBy', () => {
    it('false when masked indices match', () => {
      const cell = new CellInfo();
      cell.setConstraint(WangIndex.TopRight, 2);
      expect(cell.isViolatedBy(new WangId([0, 2, 0, 1, 0, 1, 0, 1]))).toBe(false);
    });

    it('true when a masked index differs', () => {
      const cell = new CellInfo();
      cell.setConstraint(WangIndex.TopRight, 2);
      expect(cell.isViolatedBy(WangId.allCorners(1))).toBe(true);
    });

    it('ignores preferences', () => {
      const cell = new CellInfo();
      cell.setPreference(WangIndex.TopRight, 2);
      expect(cell.isViolatedBy(WangId.allCorners(1))).toBe(false);
    });

    it('a masked 0 never counts as a violation', () => {
      const cell = new CellInfo();
      cell.setConstraint(WangIndex.Top, 0);
      expect(cell.isViolatedBy(WangId.all(2))).toBe(false);
    });
  });

  it('clone is independent', () => {
    const cell = new CellInfo();
    cell.setConstraint(WangIndex.Top, 1);
    const copy = cell.clone();
    copy.setConstraint(WangIndex.Bottom, 2);
    expect(cell.isConstrained(WangIndex.Bottom)).toBe(false);
    expect(copy.isConstrained(WangIndex.Top)).toBe(true);
    expect(copy.desired.indexColor(WangIndex.Top)).toBe(1);
  });
});
