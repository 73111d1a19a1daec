import { z } from 'zod';
import { OBSTACLE_KINDS, TILE_SIZE, TileIndex } from '../config';
import { ArrayTileLayer } from '../grid/ArrayTileLayer';
import type { GridCoordinate } from '../grid/GridTypes';

/**
 * Map rows use one character per cell:
 *   .  grass        S  stone on grass
 *   T  tree trunk on grass (canopy goes one row up)
 *   ~  water (no ground)
 *   @  grass, agent spawn
 */
export const MapLayoutSchema = z
  .object({
    name: z.string().min(1),
    rows: z.array(z.string().min(1).regex(/^[.ST~@]+$/, 'unknown map character')).min(1),
  })
  .refine((m) => new Set(m.rows.map((r) => r.length)).size <= 1, {
    message: 'all rows must have the same length',
    path: ['rows'],
  });

export type MapLayout = z.infer<typeof MapLayoutSchema>;

export type MapLayers = {
  ground: ArrayTileLayer;
  stones: ArrayTileLayer;
  trees: ArrayTileLayer;
};

/** Throws ZodError on malformed input. */
export function parseMapLayout(raw: unknown): MapLayout {
  return MapLayoutSchema.parse(raw);
}

export function mapSize(layout: MapLayout): { width: number; height: number } {
  return { width: layout.rows[0].length, height: layout.rows.length };
}

export function createMapLayers(layout: MapLayout, tileSize: number = TILE_SIZE): MapLayers {
  const { width, height } = mapSize(layout);
  const layer = () => new ArrayTileLayer({ width, height, tileSize });
  const layers: MapLayers = { ground: layer(), stones: layer(), trees: layer() };

  layout.rows.forEach((row, y) => {
    [...row].forEach((ch, x) => {
      if (ch === '~') return;
      layers.ground.putTile({ x, y }, TileIndex.Grass);
      if (ch === 'S') layers.stones.putTile({ x, y }, TileIndex.Stone);
      if (ch === 'T') layers.trees.putTile({ x, y }, TileIndex.TreeTrunk);
    });
  });

  // Canopies after trunks so a trunk is never overwritten by the tree below it.
  layers.trees.forEachTile((c, index) => {
    if (index !== TileIndex.TreeTrunk) return;
    for (const o of OBSTACLE_KINDS.tree.decorationOffsets) {
      const canopy = { x: c.x + o.x, y: c.y + o.y };
      if (canopy.y < 0 || canopy.x < 0 || canopy.x >= width || canopy.y >= height) continue;
      if (layers.trees.hasTile(canopy)) continue;
      layers.trees.putTile(canopy, TileIndex.TreeCanopy);
    }
  });

  return layers;
}

/** The '@' cell, else the first plain grass cell in row-major order. */
export function findSpawnCell(layout: MapLayout): GridCoordinate {
  let fallback: GridCoordinate | null = null;
  for (let y = 0; y < layout.rows.length; y++) {
    const row = layout.rows[y];
    for (let x = 0; x < row.length; x++) {
      if (row[x] === '@') return { x, y };
      if (!fallback && row[x] === '.') fallback = { x, y };
    }
  }
  if (!fallback) throw new Error(`Map "${layout.name}" has no walkable spawn cell`);
  return fallback;
}
