import { WangId } from './wang-id.js';
import type { TerrainSetType } from './wang-id.js';

/**
 * Per-tile terrain assignment as authored in a terrain set.
 * One slot per corner/edge of the mode; each slot is a 0-based terrain index or null.
 */
export type TileTerrainData = ReadonlyArray<number | null>;

/**
 * Wang index written by each authored slot, per mode.
 *   corner: TL, TR, BL, BR
 *   edge:   Top, Right, Bottom, Left
 *   mixed:  TL, Top, TR, Right, BR, Bottom, BL, Left
 */
export const SLOT_POSITIONS: Record<TerrainSetType, readonly number[]> = {
  corner: [7, 1, 5, 3],
  edge: [0, 2, 4, 6],
  mixed: [7, 0, 1, 2, 3, 4, 5, 6],
};

export function slotCount(type: TerrainSetType): number {
  return SLOT_POSITIONS[type].length;
}

/** Terrain index N is stored as color N + 1; null or missing slots stay 0 */
export function wangIdFromTerrain(data: TileTerrainData, type: TerrainSetType): WangId {
  const wangId = WangId.wildcard();
  const positions = SLOT_POSITIONS[type];
  for (let slot = 0; slot < positions.length; slot++) {
    const terrain = data[slot];
    if (terrain === null || terrain === undefined) continue;
    wangId.setIndexColor(positions[slot], terrain + 1);
  }
  return wangId;
}

export function hasAnyTerrain(data: TileTerrainData): boolean {
  return data.some(t => t !== null && t !== undefined);
}
