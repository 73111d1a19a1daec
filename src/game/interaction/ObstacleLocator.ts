import { ROOT_SCAN_RADIUS } from '../config';
import type { GridModel } from '../grid/GridModel';
import { manhattan, offsetCell, sameCell } from '../grid/GridTypes';
import type { GridCoordinate } from '../grid/GridTypes';
import { blocksAt } from '../grid/TileLayerSource';
import type { ObstacleLayer } from '../grid/TileLayerSource';

export type ObstacleHit = {
  /** The blocking cell that owns the obstacle. */
  root: GridCoordinate;
  layer: ObstacleLayer;
};

// Up, down, left, right (screen space: y grows downward).
const ADJACENT: readonly GridCoordinate[] = [
  { x: 0, y: -1 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
];

/**
 * Finds the obstacle a clicked cell belongs to. The clicked cell wins if it
 * blocks; otherwise cells within `radius` are scanned row by row for a root
 * whose decoration covers the click (a canopy above its trunk, say).
 */
export function locateObstacleRoot(
  target: GridCoordinate,
  layers: readonly ObstacleLayer[],
  radius: number = ROOT_SCAN_RADIUS,
): ObstacleHit | null {
  if (radius < 0) throw new Error(`Scan radius must be >= 0, got ${radius}`);

  for (const layer of layers) {
    if (blocksAt(layer, target)) return { root: { ...target }, layer };
  }

  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (dx === 0 && dy === 0) continue;
      const candidate = { x: target.x + dx, y: target.y + dy };
      for (const layer of layers) {
        if (!blocksAt(layer, candidate)) continue;
        const covers = layer.kind.decorationOffsets.some((o) => sameCell(offsetCell(candidate, o), target));
        if (covers) return { root: candidate, layer };
      }
    }
  }
  return null;
}

/** Root plus decoration cells: everything a break clears. */
export function obstacleFootprint(hit: ObstacleHit): GridCoordinate[] {
  return [hit.root, ...hit.layer.kind.decorationOffsets.map((o) => offsetCell(hit.root, o))];
}

/**
 * Walkable 4-neighbour of `root` closest (Manhattan) to `from`; ties keep the
 * first in up, down, left, right order. Null when the obstacle is boxed in.
 */
export function nearestWalkableAdjacent(
  grid: GridModel,
  root: GridCoordinate,
  from: GridCoordinate,
): GridCoordinate | null {
  let best: GridCoordinate | null = null;
  let bestDist = Infinity;
  for (const o of ADJACENT) {
    const cell = offsetCell(root, o);
    if (!grid.isWalkable(cell)) continue;
    const dist = manhattan(cell, from);
    if (dist < bestDist) {
      best = cell;
      bestDist = dist;
    }
  }
  return best;
}
