import { WangId, NEIGHBOR_OFFSETS, WANG_INDEX_COUNT } from './wang-id.js';
import { CellInfo } from './cell-info.js';
import type { TileGrid } from './tile-grid.js';
import type { TerrainSource } from './terrain-set.js';
import { SeededRandom } from './seeded-random.js';
import type { RandomSource } from './seeded-random.js';
import { findBestMatch, tileWangId, wangIdFromSurroundings } from './matching.js';
import { resolveTrace, taggedTrace } from './fill-trace.js';
import type { FillTrace, TraceOptions } from './fill-trace.js';

export type GridPosition = readonly [x: number, y: number];

export interface WangFillerOptions extends TraceOptions {
  /** Seed for tile selection (default 0) */
  seed?: number | bigint;
  /** Explicit generator; takes precedence over seed */
  rng?: RandomSource;
}

function posKey(x: number, y: number): string {
  return `${x},${y}`;
}

/**
 * Fills a region of a tile grid with terrain tiles in three phases:
 *   1. Build constraints: existing tiles and placed neighbors become soft preferences
 *   2. Place tiles: select per cell, then hard-constrain every placed neighbor
 *   3. Corrections: one pass over neighbors outside the region that now conflict
 *
 * A filler is meant for a single apply(); seed hard constraints with cellAt() first.
 */
export class WangFiller {
  private cells: Map<string, CellInfo> = new Map();
  private corrections: Array<[number, number]> = [];
  private correctionKeys: Set<string> = new Set();
  private rng: RandomSource;
  private trace: FillTrace | undefined;

  constructor(private readonly terrainSet: TerrainSource, opts: WangFillerOptions = {}) {
    if (opts.rng) {
      this.rng = opts.rng;
    } else if (typeof opts.seed === 'bigint') {
      this.rng = SeededRandom.fromSeed64(opts.seed);
    } else {
      this.rng = new SeededRandom(opts.seed ?? 0);
    }
    const trace = resolveTrace(opts);
    this.trace = trace ? taggedTrace(trace, 'wang-filler') : undefined;
  }

  /** Constraints for (x, y), created empty on first access */
  cellAt(x: number, y: number): CellInfo {
    const key = posKey(x, y);
    let cell = this.cells.get(key);
    if (!cell) {
      cell = new CellInfo();
      this.cells.set(key, cell);
    }
    return cell;
  }

  /** Constraints for (x, y) if any were recorded */
  peekCell(x: number, y: number): CellInfo | undefined {
    return this.cells.get(posKey(x, y));
  }

  apply(grid: TileGrid, region: ReadonlyArray<GridPosition>): void {
    const regionKeys = new Set(region.map(([x, y]) => posKey(x, y)));

    this.buildConstraints(grid, region);
    this.placeTiles(grid, region, regionKeys);
    this.applyCorrections(grid, regionKeys);
  }

  /** Phase 1. Existing content only ever becomes a preference, never a mask bit. */
  private buildConstraints(grid: TileGrid, region: ReadonlyArray<GridPosition>): void {
    for (const [x, y] of region) {
      if (!grid.inBounds(x, y)) continue;

      const existingTile = grid.tileAt(x, y);
      if (existingTile !== null) {
        const existing = tileWangId(this.terrainSet, existingTile);
        if (existing) this.mergePreferences(this.cellAt(x, y), existing);
      }

      const around = wangIdFromSurroundings(grid, x, y, this.terrainSet);
      this.mergePreferences(this.cellAt(x, y), around);
    }
  }

  private mergePreferences(cell: CellInfo, colors: WangId): void {
    for (let i = 0; i < WANG_INDEX_COUNT; i++) {
      const color = colors.indexColor(i);
      if (color !== 0) cell.setPreference(i, color);
    }
  }

  /** Phase 2 */
  private placeTiles(grid: TileGrid, region: ReadonlyArray<GridPosition>, regionKeys: Set<string>): void {
    for (const [x, y] of region) {
      if (!grid.inBounds(x, y)) continue;

      const cell = this.peekCell(x, y) ?? new CellInfo();
      const chosen = findBestMatch(this.terrainSet, cell, this.rng, this.trace);
      if (chosen === undefined) continue;

      grid.setTileAt(x, y, chosen);

      const chosenWangId = tileWangId(this.terrainSet, chosen);
      if (!chosenWangId) continue;

      for (let dir = 0; dir < WANG_INDEX_COUNT; dir++) {
        const [dx, dy] = NEIGHBOR_OFFSETS[dir];
        const nx = x + dx;
        const ny = y + dy;
        if (!grid.inBounds(nx, ny)) continue;

        const neighborTile = grid.tileAt(nx, ny);
        if (neighborTile === null) continue;

        const neighborCell = this.cellAt(nx, ny);
        neighborCell.setConstraint(WangId.oppositeIndex(dir), chosenWangId.indexColor(dir));

        if (regionKeys.has(posKey(nx, ny))) continue;
        const neighborWangId = tileWangId(this.terrainSet, neighborTile);
        if (neighborWangId && neighborCell.isViolatedBy(neighborWangId)) {
          this.queueCorrection(nx, ny);
        }
      }
    }
  }

  private queueCorrection(x: number, y: number): void {
    const key = posKey(x, y);
    if (this.correctionKeys.has(key)) return;
    this.correctionKeys.add(key);
    this.corrections.push([x, y]);
  }

  /** Phase 3. Single pass: corrected cells do not propagate further. */
  private applyCorrections(grid: TileGrid, regionKeys: Set<string>): void {
    const queue = this.corrections;
    this.corrections = [];
    this.correctionKeys.clear();

    if (queue.length > 0) this.trace?.info(`corrections: ${queue.length} queued`);

    for (const [x, y] of queue) {
      if (regionKeys.has(posKey(x, y))) continue;
      if (!grid.inBounds(x, y)) continue;

      const current = grid.tileAt(x, y);
      if (current === null) continue;
      const currentWangId = tileWangId(this.terrainSet, current);
      if (!currentWangId) continue;

      const cell = this.peekCell(x, y);
      if (!cell || !cell.isViolatedBy(currentWangId)) continue;

      const fix = findBestMatch(this.terrainSet, cell, this.rng, this.trace);
      if (fix !== undefined) grid.setTileAt(x, y, fix);
    }
  }
}
