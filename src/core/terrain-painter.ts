import { WANG_INDEX_COUNT } from './wang-id.js';
import type { TileGrid } from './tile-grid.js';
import { SimpleTileGrid } from './tile-grid.js';
import type { TerrainSource } from './terrain-set.js';
import { WangFiller } from './wang-filler.js';
import type { GridPosition } from './wang-filler.js';
import {
  affectedCells,
  cornerTarget,
  describeTarget,
  horizontalEdgeTarget,
  paintSeed,
  verticalEdgeTarget,
} from './paint-target.js';
import type { PaintTarget } from './paint-target.js';
import { resolveTrace, taggedTrace } from './fill-trace.js';
import type { TraceOptions } from './fill-trace.js';

export type PaintOptions = TraceOptions;

/** A cell whose tile a paint would change */
export interface TileChange {
  x: number;
  y: number;
  tileId: number;
}

/**
 * Paint a terrain onto a corner or edge and refill the 2-4 cells touching it.
 * Each touching cell gets a hard constraint only on the index that lies on the
 * target, so in mixed mode corners and edges stay independent.
 * Returns the region that was filled.
 */
export function paintTerrainAtTarget(
  grid: TileGrid,
  target: PaintTarget,
  terrainSet: TerrainSource,
  terrainIndex: number,
  opts: PaintOptions = {}
): GridPosition[] {
  const color = terrainIndex + 1;
  const sink = resolveTrace(opts);
  const trace = sink ? taggedTrace(sink, 'terrain-painter') : undefined;

  trace?.info(`paint ${describeTarget(target)}, terrain ${terrainIndex} (color ${color}), type ${terrainSet.type}`);

  const filler = new WangFiller(terrainSet, { seed: paintSeed(target), trace: sink });
  const region: Array<[number, number]> = [];

  for (const { x, y, index } of affectedCells(target, grid.width, grid.height)) {
    filler.cellAt(x, y).setConstraint(index, color);
    trace?.info(`  tile (${x}, ${y}): HARD constraint at index ${index} = ${color}`);
    region.push([x, y]);
  }

  trace?.info(`affected region: ${region.map(([x, y]) => `(${x}, ${y})`).join(' ') || '(none)'}`);

  filler.apply(grid, region);
  return region;
}

/** Paint at the intersection of up to 4 tiles */
export function paintTerrainCorner(
  grid: TileGrid,
  cornerX: number,
  cornerY: number,
  terrainSet: TerrainSource,
  terrainIndex: number,
  opts: PaintOptions = {}
): GridPosition[] {
  return paintTerrainAtTarget(grid, cornerTarget(cornerX, cornerY), terrainSet, terrainIndex, opts);
}

/** Paint the edge between rows edgeY - 1 and edgeY in column tileX */
export function paintTerrainHorizontalEdge(
  grid: TileGrid,
  tileX: number,
  edgeY: number,
  terrainSet: TerrainSource,
  terrainIndex: number,
  opts: PaintOptions = {}
): GridPosition[] {
  return paintTerrainAtTarget(grid, horizontalEdgeTarget(tileX, edgeY), terrainSet, terrainIndex, opts);
}

/** Paint the edge between columns edgeX - 1 and edgeX in row tileY */
export function paintTerrainVerticalEdge(
  grid: TileGrid,
  edgeX: number,
  tileY: number,
  terrainSet: TerrainSource,
  terrainIndex: number,
  opts: PaintOptions = {}
): GridPosition[] {
  return paintTerrainAtTarget(grid, verticalEdgeTarget(edgeX, tileY), terrainSet, terrainIndex, opts);
}

/**
 * Reselect the tile at (x, y), preferring `primaryTerrain` everywhere while
 * fitting the placed neighbors. Nothing is hard-constrained up front.
 */
export function updateTileWithNeighbors(
  grid: TileGrid,
  x: number,
  y: number,
  terrainSet: TerrainSource,
  primaryTerrain: number,
  opts: PaintOptions = {}
): void {
  if (!grid.inBounds(x, y)) return;

  const color = primaryTerrain + 1;
  const filler = new WangFiller(terrainSet, { seed: 0, trace: resolveTrace(opts) });
  const cell = filler.cellAt(x, y);
  for (let i = 0; i < WANG_INDEX_COUNT; i++) {
    cell.setPreference(i, color);
  }

  filler.apply(grid, [[x, y]]);
}

function copyGrid(grid: TileGrid): SimpleTileGrid {
  const copy = new SimpleTileGrid(grid.width, grid.height);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      copy.setTileAt(x, y, grid.tileAt(x, y));
    }
  }
  return copy;
}

/** Cells of `after` holding a different (non-empty) tile than `tileBefore` reports, row-major */
function diffGrids(tileBefore: (x: number, y: number) => number | null, after: TileGrid): TileChange[] {
  const changes: TileChange[] = [];
  for (let y = 0; y < after.height; y++) {
    for (let x = 0; x < after.width; x++) {
      const tileId = after.tileAt(x, y);
      if (tileId !== null && tileId !== tileBefore(x, y)) {
        changes.push({ x, y, tileId });
      }
    }
  }
  return changes;
}

function paintAll(
  scratch: TileGrid,
  targets: ReadonlyArray<PaintTarget>,
  terrainSet: TerrainSource,
  terrainIndex: number
): void {
  for (const target of targets) {
    paintTerrainAtTarget(scratch, target, terrainSet, terrainIndex);
  }
}

/**
 * What painting each target in turn would change, computed on one scratch
 * copy of the grid. The grid passed in is left untouched.
 */
export function previewTerrainAtTargets(
  grid: TileGrid,
  targets: ReadonlyArray<PaintTarget>,
  terrainSet: TerrainSource,
  terrainIndex: number
): TileChange[] {
  if (targets.length === 0) return [];

  const scratch = copyGrid(grid);
  paintAll(scratch, targets, terrainSet, terrainIndex);
  return diffGrids((x, y) => grid.tileAt(x, y), scratch);
}

export function previewTerrainAtTarget(
  grid: TileGrid,
  target: PaintTarget,
  terrainSet: TerrainSource,
  terrainIndex: number
): TileChange[] {
  return previewTerrainAtTargets(grid, [target], terrainSet, terrainIndex);
}

/** Paint into a flat row-major tile array in place */
export function paint(
  tiles: Array<number | null>,
  width: number,
  height: number,
  target: PaintTarget,
  terrainSet: TerrainSource,
  terrainIndex: number,
  opts: PaintOptions = {}
): void {
  paintTerrainAtTarget(SimpleTileGrid.wrap(tiles, width, height), target, terrainSet, terrainIndex, opts);
}

/** Preview against a flat row-major tile array without modifying it */
export function preview(
  tiles: ReadonlyArray<number | null>,
  width: number,
  height: number,
  targets: PaintTarget | ReadonlyArray<PaintTarget>,
  terrainSet: TerrainSource,
  terrainIndex: number
): TileChange[] {
  // The copy is the scratch grid; the caller's array stays the baseline
  const scratch = SimpleTileGrid.wrap(tiles.slice(), width, height);
  paintAll(scratch, isTargetList(targets) ? targets : [targets], terrainSet, terrainIndex);
  return diffGrids((x, y) => tiles[y * width + x], scratch);
}

function isTargetList(targets: PaintTarget | ReadonlyArray<PaintTarget>): targets is ReadonlyArray<PaintTarget> {
  return Array.isArray(targets);
}
