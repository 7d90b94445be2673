import { WangId, NEIGHBOR_OFFSETS, WANG_INDEX_COUNT, activeIndices } from './wang-id.js';
import type { CellInfo } from './cell-info.js';
import type { TileGrid } from './tile-grid.js';
import type { TerrainSource } from './terrain-set.js';
import { wangIdFromTerrain } from './tile-terrain.js';
import { RandomPicker } from './random-picker.js';
import type { RandomSource } from './seeded-random.js';
import type { FillTrace } from './fill-trace.js';

/** Penalties this close to the best score tie with it (single-precision epsilon) */
export const PENALTY_EPSILON = 1.1920929e-7;

/** Penalty for an unmet preference where the tile has no terrain at all */
export const EMPTY_POSITION_PENALTY = 1.0;

/** Wang colors of a tile in this set; undefined if the set has no data for it */
export function tileWangId(terrainSet: TerrainSource, tileId: number): WangId | undefined {
  const data = terrainSet.getTileTerrain(tileId);
  return data ? wangIdFromTerrain(data, terrainSet.type) : undefined;
}

/**
 * Build a desired WangId from the 8 neighbors of position (x, y).
 * For each placed neighbor, the color on the shared boundary is the neighbor's
 * color at the opposite index. Empty, unknown and out-of-bounds neighbors stay 0.
 */
export function wangIdFromSurroundings(
  grid: TileGrid,
  x: number,
  y: number,
  terrainSet: TerrainSource
): WangId {
  const result = WangId.wildcard();

  for (let index = 0; index < WANG_INDEX_COUNT; index++) {
    const [dx, dy] = NEIGHBOR_OFFSETS[index];
    const nx = x + dx;
    const ny = y + dy;
    if (!grid.inBounds(nx, ny)) continue;

    const neighborTile = grid.tileAt(nx, ny);
    if (neighborTile === null) continue;

    const neighborWangId = tileWangId(terrainSet, neighborTile);
    if (!neighborWangId) continue;

    const color = neighborWangId.indexColor(WangId.oppositeIndex(index));
    if (color !== 0) result.setIndexColor(index, color);
  }

  return result;
}

/**
 * Score a tile against a cell's constraints over the set's active indices.
 * Returns undefined if a hard constraint is broken (0 only matches 0),
 * otherwise the summed penalty of unmet preferences (lower is better).
 */
export function scoreTile(
  cell: CellInfo,
  candidate: WangId,
  terrainSet: TerrainSource
): number | undefined {
  let penalty = 0;

  for (const i of activeIndices(terrainSet.type)) {
    const want = cell.desired.indexColor(i);
    const have = candidate.indexColor(i);

    if (cell.mask[i]) {
      if (want !== have) return undefined;
      continue;
    }
    if (want === 0 || want === have) continue;

    if (have === 0) {
      penalty += EMPTY_POSITION_PENALTY;
    } else {
      penalty += terrainSet.transitionPenalty(want - 1, have - 1);
    }
  }

  return penalty;
}

function describeConstraints(cell: CellInfo, terrainSet: TerrainSource, trace: FillTrace): void {
  const active = activeIndices(terrainSet.type);
  trace.info(`findBestMatch: constraints (type ${terrainSet.type}, active [${active.join(',')}])`);
  for (const i of active) {
    const color = cell.desired.indexColor(i);
    const terrain = color > 0 ? `terrain ${color - 1}` : 'no terrain';
    if (cell.mask[i]) {
      trace.info(`  index ${i}: HARD = ${color} (${terrain})`);
    } else if (color !== 0) {
      trace.info(`  index ${i}: soft = ${color} (${terrain})`);
    }
  }
}

/**
 * Pick a tile for a cell. Every tile carrying terrain is scored; those within
 * PENALTY_EPSILON of the lowest penalty compete with weight
 * probability / (1 + penalty). Returns undefined if every tile is rejected.
 */
export function findBestMatch(
  terrainSet: TerrainSource,
  cell: CellInfo,
  rng: RandomSource,
  trace?: FillTrace
): number | undefined {
  if (trace) describeConstraints(cell, terrainSet, trace);

  const candidates = new RandomPicker<number>();
  let bestPenalty = Infinity;
  let rejected = 0;

  for (const tileId of terrainSet.tilesWithTerrain()) {
    const candidate = tileWangId(terrainSet, tileId);
    if (!candidate) continue;

    const penalty = scoreTile(cell, candidate, terrainSet);
    if (penalty === undefined) {
      rejected++;
      trace?.info(`  tile ${tileId}: REJECTED (wang [${candidate.toKey()}])`);
      continue;
    }
    trace?.info(`  tile ${tileId}: ACCEPTED (penalty ${penalty}, wang [${candidate.toKey()}])`);

    if (penalty < bestPenalty) {
      bestPenalty = penalty;
      candidates.clear();
    }
    if (Math.abs(penalty - bestPenalty) < PENALTY_EPSILON) {
      candidates.add(tileId, terrainSet.tileProbability(tileId) / (1 + penalty));
    }
  }

  trace?.info(`findBestMatch: ${candidates.size} candidates, ${rejected} rejected`);

  const result = candidates.pick(rng);
  if (trace) {
    if (result === undefined) trace.warn('findBestMatch: no matching tile found');
    else trace.info(`findBestMatch: selected tile ${result}`);
  }
  return result;
}
