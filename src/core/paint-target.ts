import { WangIndex } from './wang-id.js';
import type { TerrainSetType } from './wang-id.js';

/** What a terrain brush stroke lands on. Coordinates are Y-up and never negative. */
export type PaintTarget =
  /** Intersection of up to 4 tiles */
  | { kind: 'corner'; cornerX: number; cornerY: number }
  /** Boundary between tile rows edgeY - 1 and edgeY, in column tileX */
  | { kind: 'horizontal-edge'; tileX: number; edgeY: number }
  /** Boundary between tile columns edgeX - 1 and edgeX, in row tileY */
  | { kind: 'vertical-edge'; edgeX: number; tileY: number };

/** Whole, non-negative coordinate; NaN and infinities become 0 */
function clampCoord(v: number): number {
  return Number.isFinite(v) ? Math.max(0, Math.trunc(v)) : 0;
}

export function cornerTarget(cornerX: number, cornerY: number): PaintTarget {
  return { kind: 'corner', cornerX: clampCoord(cornerX), cornerY: clampCoord(cornerY) };
}

export function horizontalEdgeTarget(tileX: number, edgeY: number): PaintTarget {
  return { kind: 'horizontal-edge', tileX: clampCoord(tileX), edgeY: clampCoord(edgeY) };
}

export function verticalEdgeTarget(edgeX: number, tileY: number): PaintTarget {
  return { kind: 'vertical-edge', edgeX: clampCoord(edgeX), tileY: clampCoord(tileY) };
}

/** Fractional part in [0, 1), also for negative input */
function localOffset(v: number): number {
  const f = v - Math.trunc(v);
  return f < 0 ? f + 1 : f;
}

// Mixed mode splits a tile into a 3x3 grid of zones
const ZONE_LOW = 0.33;
const ZONE_HIGH = 0.67;

function zoneOf(local: number): 0 | 1 | 2 {
  if (local < ZONE_LOW) return 0;
  if (local < ZONE_HIGH) return 1;
  return 2;
}

/**
 * Resolve a world position to the corner or edge the brush should paint.
 *   corner: nearest tile corner
 *   edge:   nearest edge, horizontal or vertical by distance to the tile's midlines
 *   mixed:  outer zones pick their corner or edge; the center zone snaps to the nearest corner
 */
export function getPaintTarget(
  worldX: number,
  worldY: number,
  tileSize: number,
  type: TerrainSetType
): PaintTarget {
  const fx = worldX / tileSize;
  const fy = worldY / tileSize;
  const tileX = Math.floor(fx);
  const tileY = Math.floor(fy);
  const localX = localOffset(fx);
  const localY = localOffset(fy);

  if (type === 'corner') {
    return cornerTarget(
      localX < 0.5 ? tileX : tileX + 1,
      localY < 0.5 ? tileY : tileY + 1
    );
  }

  if (type === 'edge') {
    const distH = Math.abs(localY - 0.5);
    const distV = Math.abs(localX - 0.5);
    if (distH < distV) {
      return horizontalEdgeTarget(tileX, localY < 0.5 ? tileY : tileY + 1);
    }
    return verticalEdgeTarget(localX < 0.5 ? tileX : tileX + 1, tileY);
  }

  const zoneX = zoneOf(localX);
  const zoneY = zoneOf(localY);

  if (zoneX !== 1 && zoneY !== 1) {
    return cornerTarget(zoneX === 0 ? tileX : tileX + 1, zoneY === 0 ? tileY : tileY + 1);
  }
  if (zoneX === 1 && zoneY !== 1) {
    return horizontalEdgeTarget(tileX, zoneY === 0 ? tileY : tileY + 1);
  }
  if (zoneX !== 1) {
    return verticalEdgeTarget(zoneX === 0 ? tileX : tileX + 1, tileY);
  }

  // Center zone: renormalize into the zone, then pick the nearest corner
  const centerX = (localX - ZONE_LOW) / (ZONE_HIGH - ZONE_LOW);
  const centerY = (localY - ZONE_LOW) / (ZONE_HIGH - ZONE_LOW);
  return cornerTarget(centerX < 0.5 ? tileX : tileX + 1, centerY < 0.5 ? tileY : tileY + 1);
}

export interface AffectedCell {
  x: number;
  y: number;
  /** Wang index of this cell that sits on the target */
  index: number;
}

function candidateCells(target: PaintTarget): AffectedCell[] {
  switch (target.kind) {
    case 'corner': {
      const { cornerX: cx, cornerY: cy } = target;
      return [
        { x: cx - 1, y: cy - 1, index: WangIndex.TopRight },    // below-left
        { x: cx, y: cy - 1, index: WangIndex.TopLeft },         // below-right
        { x: cx - 1, y: cy, index: WangIndex.BottomRight },     // above-left
        { x: cx, y: cy, index: WangIndex.BottomLeft },          // above-right
      ];
    }
    case 'horizontal-edge':
      return [
        { x: target.tileX, y: target.edgeY - 1, index: WangIndex.Top },
        { x: target.tileX, y: target.edgeY, index: WangIndex.Bottom },
      ];
    case 'vertical-edge':
      return [
        { x: target.edgeX - 1, y: target.tileY, index: WangIndex.Right },
        { x: target.edgeX, y: target.tileY, index: WangIndex.Left },
      ];
  }
}

/** The in-bounds cells a target touches, with the index each one exposes to it */
export function affectedCells(target: PaintTarget, width: number, height: number): AffectedCell[] {
  return candidateCells(target).filter(c => c.x >= 0 && c.y >= 0 && c.x < width && c.y < height);
}

const HORIZONTAL_EDGE_SEED_TAG = 0x1000_0000_0000_0000n;
const VERTICAL_EDGE_SEED_TAG = 0x2000_0000_0000_0000n;

function seedWord(v: number): bigint {
  return BigInt.asUintN(32, BigInt(Number.isFinite(v) ? Math.trunc(v) : 0));
}

/** Deterministic 64-bit seed per target; each kind is tagged so coincident coordinates differ */
export function paintSeed(target: PaintTarget): bigint {
  switch (target.kind) {
    case 'corner':
      return (seedWord(target.cornerX) << 32n) | seedWord(target.cornerY);
    case 'horizontal-edge':
      return (seedWord(target.tileX) << 32n) | seedWord(target.edgeY) | HORIZONTAL_EDGE_SEED_TAG;
    case 'vertical-edge':
      return (seedWord(target.edgeX) << 32n) | seedWord(target.tileY) | VERTICAL_EDGE_SEED_TAG;
  }
}

export function describeTarget(target: PaintTarget): string {
  switch (target.kind) {
    case 'corner':
      return `corner (${target.cornerX}, ${target.cornerY})`;
    case 'horizontal-edge':
      return `horizontal edge (tile x ${target.tileX}, edge y ${target.edgeY})`;
    case 'vertical-edge':
      return `vertical edge (edge x ${target.edgeX}, tile y ${target.tileY})`;
  }
}
