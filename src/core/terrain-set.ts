import { WangId } from './wang-id.js';
import type { TerrainSetType } from './wang-id.js';
import { wangIdFromTerrain, hasAnyTerrain } from './tile-terrain.js';
import type { TileTerrainData } from './tile-terrain.js';
import { computeTerrainDistances } from './terrain-distance.js';

export interface Terrain {
  name: string;
  /** Hex color for editor display */
  color: string;
}

/** What the fill engine needs to know about a terrain set */
export interface TerrainSource {
  readonly type: TerrainSetType;
  getTileTerrain(tileId: number): TileTerrainData | undefined;
  /** Tile ids carrying at least one terrain, in selection order */
  tilesWithTerrain(): Iterable<number>;
  transitionPenalty(fromTerrain: number, toTerrain: number): number;
  tileProbability(tileId: number): number;
}

export class TerrainSet implements TerrainSource {
  name: string;
  type: TerrainSetType;
  terrains: Terrain[];
  /** tileId -> authored terrain slots, insertion order preserved */
  private tileTerrains: Map<number, TileTerrainData> = new Map();
  private tileProbabilities: Map<number, number> = new Map();
  /** Explicit costs keyed "from,to" */
  private penaltyOverrides: Map<string, number> = new Map();
  /** Lazily rebuilt when tiles or terrains change */
  private distanceMatrix: number[][] | null = null;

  constructor(name: string, type: TerrainSetType, terrains: Terrain[] = []) {
    this.name = name;
    this.type = type;
    this.terrains = terrains;
  }

  get terrainCount(): number {
    return this.terrains.length;
  }

  addTerrain(terrain: Terrain): number {
    this.terrains.push(terrain);
    this.distanceMatrix = null;
    return this.terrains.length - 1;
  }

  /** Add or update a tile's terrain assignment */
  setTileTerrain(tileId: number, data: TileTerrainData, probability?: number): void {
    this.tileTerrains.set(tileId, [...data]);
    if (probability !== undefined) this.tileProbabilities.set(tileId, probability);
    this.distanceMatrix = null;
  }

  removeTileTerrain(tileId: number): void {
    this.tileTerrains.delete(tileId);
    this.tileProbabilities.delete(tileId);
    this.distanceMatrix = null;
  }

  /** Returns undefined if the tile isn't in this set */
  getTileTerrain(tileId: number): TileTerrainData | undefined {
    return this.tileTerrains.get(tileId);
  }

  /** Wang colors of a tile; undefined if the tile isn't in this set */
  wangIdOf(tileId: number): WangId | undefined {
    const data = this.tileTerrains.get(tileId);
    return data ? wangIdFromTerrain(data, this.type) : undefined;
  }

  get tileCount(): number {
    return this.tileTerrains.size;
  }

  *tilesWithTerrain(): Iterable<number> {
    for (const [tileId, data] of this.tileTerrains) {
      if (hasAnyTerrain(data)) yield tileId;
    }
  }

  setTileProbability(tileId: number, probability: number): void {
    this.tileProbabilities.set(tileId, probability);
  }

  /** Relative selection weight (default 1.0) */
  tileProbability(tileId: number): number {
    return this.tileProbabilities.get(tileId) ?? 1.0;
  }

  setTransitionPenalty(fromTerrain: number, toTerrain: number, penalty: number): void {
    this.penaltyOverrides.set(`${fromTerrain},${toTerrain}`, penalty);
  }

  clearTransitionPenalty(fromTerrain: number, toTerrain: number): void {
    this.penaltyOverrides.delete(`${fromTerrain},${toTerrain}`);
  }

  /**
   * Cost of showing `toTerrain` where `fromTerrain` was wanted.
   * Explicit overrides win; otherwise the number of transitions between the two,
   * and terrainCount when no tile chain connects them.
   */
  transitionPenalty(fromTerrain: number, toTerrain: number): number {
    const override = this.penaltyOverrides.get(`${fromTerrain},${toTerrain}`);
    if (override !== undefined) return override;
    if (fromTerrain === toTerrain) return 0;

    const distance = this.terrainDistance(fromTerrain, toTerrain);
    return distance < 0 ? this.terrainCount : distance;
  }

  /** Transition count between terrains, -1 = no path */
  terrainDistance(fromTerrain: number, toTerrain: number): number {
    const n = this.terrainCount;
    if (fromTerrain < 0 || toTerrain < 0 || fromTerrain >= n || toTerrain >= n) return -1;
    if (!this.distanceMatrix) {
      this.distanceMatrix = computeTerrainDistances(n, this.tileTerrains.values());
    }
    return this.distanceMatrix[fromTerrain][toTerrain];
  }
}
