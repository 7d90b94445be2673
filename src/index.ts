export { WangId, WangIndex, NEIGHBOR_OFFSETS, WANG_INDEX_COUNT, activeIndices, isActiveIndex, wrapIndex } from './core/wang-id.js';
export type { TerrainSetType, WangIndexName } from './core/wang-id.js';
export { CellInfo } from './core/cell-info.js';
export { SLOT_POSITIONS, slotCount, wangIdFromTerrain, hasAnyTerrain } from './core/tile-terrain.js';
export type { TileTerrainData } from './core/tile-terrain.js';
export { TerrainSet } from './core/terrain-set.js';
export type { Terrain, TerrainSource } from './core/terrain-set.js';
export { computeTerrainDistances } from './core/terrain-distance.js';
export { loadTerrainSet, validateTerrainSetData } from './core/terrain-loader.js';
export type { TerrainSetData, TerrainData, TerrainTileData, TransitionData } from './core/terrain-schema.js';
export { SimpleTileGrid } from './core/tile-grid.js';
export type { TileGrid } from './core/tile-grid.js';
export { SeededRandom } from './core/seeded-random.js';
export type { RandomSource } from './core/seeded-random.js';
export { RandomPicker } from './core/random-picker.js';
export { scoreTile, findBestMatch, wangIdFromSurroundings, tileWangId } from './core/matching.js';
export { WangFiller } from './core/wang-filler.js';
export type { GridPosition, WangFillerOptions } from './core/wang-filler.js';
export {
  getPaintTarget,
  cornerTarget,
  horizontalEdgeTarget,
  verticalEdgeTarget,
  affectedCells,
  paintSeed,
  describeTarget,
} from './core/paint-target.js';
export type { PaintTarget, AffectedCell } from './core/paint-target.js';
export {
  paint,
  preview,
  paintTerrainAtTarget,
  paintTerrainCorner,
  paintTerrainHorizontalEdge,
  paintTerrainVerticalEdge,
  previewTerrainAtTarget,
  previewTerrainAtTargets,
  updateTileWithNeighbors,
} from './core/terrain-painter.js';
export type { PaintOptions, TileChange } from './core/terrain-painter.js';
export { consoleTrace } from './core/fill-trace.js';
export type { FillTrace, TraceOptions } from './core/fill-trace.js';
