export const WANG_INDEX_COUNT = 8;

// Index names for readability. Even = edge, odd = corner.
export const WangIndex = {
  Top: 0,
  TopRight: 1,
  Right: 2,
  BottomRight: 3,
  Bottom: 4,
  BottomLeft: 5,
  Left: 6,
  TopLeft: 7,
} as const;

export type WangIndexName = keyof typeof WangIndex;

// Neighbor offsets: [dx, dy] for each wang index, Y-up (Top is y + 1)
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [dx: number, dy: number]> = [
  [0, 1],   // 0: Top
  [1, 1],   // 1: TopRight
  [1, 0],   // 2: Right
  [1, -1],  // 3: BottomRight
  [0, -1],  // 4: Bottom
  [-1, -1], // 5: BottomLeft
  [-1, 0],  // 6: Left
  [-1, 1],  // 7: TopLeft
];

export type TerrainSetType = 'corner' | 'edge' | 'mixed';

/** Wrap any integer index into 0-7 */
export function wrapIndex(index: number): number {
  return ((index % WANG_INDEX_COUNT) + WANG_INDEX_COUNT) % WANG_INDEX_COUNT;
}

/**
 * Terrain colors at the 8 clock positions around a cell.
 * Color 0 = no terrain (wildcard); color N + 1 = terrain index N.
 * Indices always wrap modulo 8.
 */
export class WangId {
  readonly colors: number[];

  constructor(colors?: readonly number[]) {
    this.colors = colors ? [...colors] : [0, 0, 0, 0, 0, 0, 0, 0];
    if (this.colors.length !== WANG_INDEX_COUNT) {
      throw new Error(`WangId requires exactly ${WANG_INDEX_COUNT} colors, got ${this.colors.length}`);
    }
  }

  /** All-zero WangId, matches anything */
  static wildcard(): WangId {
    return new WangId();
  }

  /** Get color at index 0-7 */
  indexColor(index: number): number {
    return this.colors[wrapIndex(index)];
  }

  /** Set color at index in place */
  setIndexColor(index: number, color: number): void {
    this.colors[wrapIndex(index)] = color;
  }

  /** Return new WangId with color set at index */
  withIndexColor(index: number, color: number): WangId {
    const copy = new WangId(this.colors);
    copy.setIndexColor(index, color);
    return copy;
  }

  /** Get the index on the opposite side (for neighbor matching). opposite(0)=4, opposite(1)=5, etc. */
  static oppositeIndex(index: number): number {
    return wrapIndex(index + 4);
  }

  /** 1, 3, 5, 7 are corners */
  static isCorner(index: number): boolean {
    return wrapIndex(index) % 2 === 1;
  }

  /** Next index clockwise */
  static nextIndex(index: number): number {
    return wrapIndex(index + 1);
  }

  /** Previous index counter-clockwise */
  static prevIndex(index: number): number {
    return wrapIndex(index + 7);
  }

  hasAnyTerrain(): boolean {
    return this.colors.some(c => c !== 0);
  }

  toArray(): number[] {
    return [...this.colors];
  }

  static fromArray(arr: readonly number[]): WangId {
    return new WangId(arr);
  }

  equals(other: WangId): boolean {
    for (let i = 0; i < WANG_INDEX_COUNT; i++) {
      if (this.colors[i] !== other.colors[i]) return false;
    }
    return true;
  }

  /** Create a string key for hashing/dedup */
  toKey(): string {
    return this.colors.join(',');
  }

  static allCorners(color: number): WangId {
    return new WangId([0, color, 0, color, 0, color, 0, color]);
  }

  static allEdges(color: number): WangId {
    return new WangId([color, 0, color, 0, color, 0, color, 0]);
  }

  static all(color: number): WangId {
    return new WangId(new Array<number>(WANG_INDEX_COUNT).fill(color));
  }
}

const ACTIVE_INDICES: Record<TerrainSetType, readonly number[]> = {
  corner: [1, 3, 5, 7],
  edge: [0, 2, 4, 6],
  mixed: [0, 1, 2, 3, 4, 5, 6, 7],
};

/** Check if an index is active for the given terrain set type */
export function isActiveIndex(index: number, type: TerrainSetType): boolean {
  const isCorner = WangId.isCorner(index);
  if (type === 'corner') return isCorner;
  if (type === 'edge') return !isCorner;
  return true; // mixed
}

/** The indices that take part in matching for a type */
export function activeIndices(type: TerrainSetType): readonly number[] {
  return ACTIVE_INDICES[type];
}
