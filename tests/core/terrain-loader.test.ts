import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { loadTerrainSet, validateTerrainSetData } from '../../src/core/terrain-loader.js';
import type { TerrainSetData } from '../../src/core/terrain-schema.js';

function readFixture(name: string): TerrainSetData {
  return JSON.parse(readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8'));
}

const validData: TerrainSetData = {
  name: 'Ground',
  type: 'corner',
  terrains: [
    { name: 'Grass', color: '#00ff00' },
    { name: 'Dirt', color: '#8b4513' },
  ],
  tiles: [
    { tileid: 0, terrain: [0, 0, 0, 0] },
    { tileid: 1, terrain: [1, 0, 0, 0] },
    { tileid: 2, terrain: [1, 1, 1, 1], probability: 2 },
  ],
};

describe('loadTerrainSet', () => {
  it('loads terrains and tiles', () => {
    const ts = loadTerrainSet(validData);
    expect(ts.name).toBe('Ground');
    expect(ts.type).toBe('corner');
    expect(ts.terrainCount).toBe(2);
    expect(ts.tileCount).toBe(3);
    expect(ts.getTileTerrain(1)).toEqual([1, 0, 0, 0]);
    expect(ts.tileProbability(2)).toBe(2);
    expect(ts.tileProbability(0)).toBe(1);
  });

  it('throws on a slot-count mismatch', () => {
    const bad: TerrainSetData = { ...validData, tiles: [{ tileid: 4, terrain: [0, 0, 0] }] };
    expect(() => loadTerrainSet(bad)).toThrow('Terrain for tile 4 must have exactly 4 slots in corner mode, got 3');
  });

  it('loads a terrain set from a JSON file', () => {
    const ts = loadTerrainSet(readFixture('grass-dirt-edge.json'));
    expect(ts.type).toBe('edge');
    expect([...ts.tilesWithTerrain()]).toEqual([1, 2, 3, 4]);
    expect(ts.tileProbability(2)).toBe(0.5);
    expect(ts.transitionPenalty(1, 0)).toBe(3);
    expect(ts.transitionPenalty(0, 1)).toBe(1);
  });
});

describe('validateTerrainSetData', () => {
  it('returns no errors for valid data', () => {
    expect(validateTerrainSetData(validData)).toEqual([]);
    expect(validateTerrainSetData(readFixture('grass-dirt-edge.json'))).toEqual([]);
  });

  it('catches a missing name', () => {
    expect(validateTerrainSetData({ ...validData, name: '' })).toContain('Missing name');
  });

  it('catches an invalid type', () => {
    const bad: TerrainSetData = JSON.parse(JSON.stringify({ ...validData, type: 'hex' }));
    expect(validateTerrainSetData(bad)).toContain('Invalid type "hex"');
  });

  it('requires at least one terrain', () => {
    expect(validateTerrainSetData({ ...validData, terrains: [] })).toContain('Must have at least one terrain');
  });

  it('catches a missing tiles array', () => {
    const bad: TerrainSetData = JSON.parse('{"name":"Ground","type":"edge","terrains":[{"name":"Grass","color":"#00ff00"}]}');
    expect(validateTerrainSetData(bad)).toEqual(['Missing or invalid tiles array']);
  });

  it('catches invalid and duplicate tileids', () => {
    const bad: TerrainSetData = {
      ...validData,
      tiles: [
        { tileid: -1, terrain: [0, 0, 0, 0] },
        { tileid: 3, terrain: [0, 0, 0, 0] },
        { tileid: 3, terrain: [1, 1, 1, 1] },
      ],
    };
    expect(validateTerrainSetData(bad)).toEqual([
      'tiles[0]: invalid tileid -1',
      'tiles[2]: duplicate tileid 3',
    ]);
  });

  it('catches non-positive probabilities', () => {
    const bad: TerrainSetData = { ...validData, tiles: [{ tileid: 0, terrain: [0, 0, 0, 0], probability: 0 }] };
    expect(validateTerrainSetData(bad)).toEqual(['tiles[0]: probability must be > 0, got 0']);
  });

  it('catches wrong slot counts', () => {
    const bad: TerrainSetData = { ...validData, type: 'mixed' };
    expect(validateTerrainSetData(bad)).toContain('tiles[0]: terrain must have 8 slots, got 4');
  });

  it('catches out-of-range terrain indices', () => {
    const bad: TerrainSetData = { ...validData, tiles: [{ tileid: 0, terrain: [0, 2, null, 0] }] };
    expect(validateTerrainSetData(bad)).toEqual(['tiles[0]: terrain[1] = 2 out of range [0, 2)']);
  });

  it('checks transitions', () => {
    const bad: TerrainSetData = {
      ...validData,
      transitions: [
        { from: 0, to: 1, penalty: 2 },
        { from: 5, to: -1, penalty: -1 },
      ],
    };
    expect(validateTerrainSetData(bad)).toEqual([
      'transitions[1]: from 5 out of range',
      'transitions[1]: to -1 out of range',
      'transitions[1]: penalty must be >= 0, got -1',
    ]);
  });
});
