import type { TileTerrainData } from './tile-terrain.js';

/**
 * Build a distance matrix between all terrains using Floyd-Warshall.
 * Distance 0 = same terrain
 * Distance 1 = direct transition exists (a tile has both terrains)
 * Distance N = N transitions needed
 * Distance -1 = no path exists
 *
 * Indices are 0-based terrain indices, not colors.
 */
export function computeTerrainDistances(
  terrainCount: number,
  tiles: Iterable<TileTerrainData>
): number[][] {
  const n = terrainCount;
  const dist: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(-1));

  for (let i = 0; i < n; i++) {
    dist[i][i] = 0;
  }

  // Find direct transitions from existing tiles
  for (const data of tiles) {
    const terrainsInTile = new Set<number>();
    for (const t of data) {
      if (t !== null && t >= 0 && t < n) terrainsInTile.add(t);
    }

    for (const a of terrainsInTile) {
      for (const b of terrainsInTile) {
        if (a !== b) {
          dist[a][b] = 1;
          dist[b][a] = 1;
        }
      }
    }
  }

  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        if (i === j) continue;
        if (dist[i][k] < 0 || dist[k][j] < 0) continue;
        const newDist = dist[i][k] + dist[k][j];
        if (dist[i][j] < 0 || newDist < dist[i][j]) {
          dist[i][j] = newDist;
        }
      }
    }
  }

  return dist;
}
