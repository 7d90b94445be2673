/** JSON shape of a terrain set description */

export interface TerrainSetData {
  name: string;
  type: 'corner' | 'edge' | 'mixed';
  terrains: TerrainData[];
  tiles: TerrainTileData[];
  transitions?: TransitionData[];
}

export interface TerrainData {
  name: string;
  color: string;
}

export interface TerrainTileData {
  tileid: number;
  /** 4 slots (corner/edge) or 8 slots (mixed); 0-based terrain index or null */
  terrain: Array<number | null>;
  probability?: number;  // Relative weight for tile selection (default 1.0)
}

/** Explicit cost of placing terrain `to` where `from` was preferred */
export interface TransitionData {
  from: number;
  to: number;
  penalty: number;
}

export const TERRAIN_SET_TYPES = ['corner', 'edge', 'mixed'] as const;
