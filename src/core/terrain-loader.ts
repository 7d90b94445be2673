import { TERRAIN_SET_TYPES } from './terrain-schema.js';
import type { TerrainSetData } from './terrain-schema.js';
import { TerrainSet } from './terrain-set.js';
import { slotCount } from './tile-terrain.js';

/** Build a TerrainSet from its JSON description. Throws on slot-count mismatch. */
export function loadTerrainSet(data: TerrainSetData): TerrainSet {
  const terrains = data.terrains.map(t => ({ name: t.name, color: t.color }));
  const ts = new TerrainSet(data.name, data.type, terrains);
  const expectedSlots = slotCount(data.type);

  for (const tile of data.tiles) {
    if (tile.terrain.length !== expectedSlots) {
      throw new Error(
        `Terrain for tile ${tile.tileid} must have exactly ${expectedSlots} slots in ${data.type} mode, got ${tile.terrain.length}`
      );
    }
    ts.setTileTerrain(tile.tileid, tile.terrain, tile.probability);
  }

  for (const t of data.transitions ?? []) {
    ts.setTransitionPenalty(t.from, t.to, t.penalty);
  }

  return ts;
}

function isTerrainSetType(value: unknown): value is TerrainSetData['type'] {
  return TERRAIN_SET_TYPES.some(t => t === value);
}

/** Validate a terrain set description. Returns array of error strings (empty = valid). */
export function validateTerrainSetData(json: TerrainSetData): string[] {
  const errors: string[] = [];

  if (!json.name) errors.push('Missing name');
  if (!isTerrainSetType(json.type)) {
    errors.push(`Invalid type "${String(json.type)}"`);
  }
  if (!Array.isArray(json.terrains) || json.terrains.length === 0) {
    errors.push('Must have at least one terrain');
  }
  if (!Array.isArray(json.tiles)) {
    errors.push('Missing or invalid tiles array');
    return errors;
  }

  const terrainCount = Array.isArray(json.terrains) ? json.terrains.length : 0;
  const expectedSlots = isTerrainSetType(json.type) ? slotCount(json.type) : -1;

  const seenTileIds = new Set<number>();
  for (let ti = 0; ti < json.tiles.length; ti++) {
    const tile = json.tiles[ti];
    const prefix = `tiles[${ti}]`;

    if (!Number.isInteger(tile.tileid) || tile.tileid < 0) {
      errors.push(`${prefix}: invalid tileid ${tile.tileid}`);
    }
    if (seenTileIds.has(tile.tileid)) {
      errors.push(`${prefix}: duplicate tileid ${tile.tileid}`);
    }
    seenTileIds.add(tile.tileid);

    if (tile.probability !== undefined && !(tile.probability > 0)) {
      errors.push(`${prefix}: probability must be > 0, got ${tile.probability}`);
    }

    if (!Array.isArray(tile.terrain)) {
      errors.push(`${prefix}: terrain must be an array`);
      continue;
    }
    if (expectedSlots >= 0 && tile.terrain.length !== expectedSlots) {
      errors.push(`${prefix}: terrain must have ${expectedSlots} slots, got ${tile.terrain.length}`);
    }
    for (let i = 0; i < tile.terrain.length; i++) {
      const t = tile.terrain[i];
      if (t === null) continue;
      if (!Number.isInteger(t) || t < 0 || t >= terrainCount) {
        errors.push(`${prefix}: terrain[${i}] = ${t} out of range [0, ${terrainCount})`);
      }
    }
  }

  const transitions = json.transitions ?? [];
  for (let i = 0; i < transitions.length; i++) {
    const { from, to, penalty } = transitions[i];
    const prefix = `transitions[${i}]`;
    if (from < 0 || from >= terrainCount) errors.push(`${prefix}: from ${from} out of range`);
    if (to < 0 || to >= terrainCount) errors.push(`${prefix}: to ${to} out of range`);
    if (!(penalty >= 0)) errors.push(`${prefix}: penalty must be >= 0, got ${penalty}`);
  }

  return errors;
}
