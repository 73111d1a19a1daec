import type { ObstacleKind } from '../config';
import type { CellBounds, GridCoordinate, WorldPoint } from './GridTypes';

export interface TileLayerSource {
  /** Tile size in pixels. */
  readonly tileSize: number;
  /** True if any tile sits at this cell. */
  hasTile(c: GridCoordinate): boolean;
  /** Tile index at this cell, or null for an empty cell. */
  tileAt(c: GridCoordinate): number | null;
  /** Extent of the layer in cells. */
  bounds(): CellBounds;
  /** Convert world -> integer cell coords. */
  worldToCell(p: WorldPoint): GridCoordinate;
  /** Cell center in world coordinates. */
  cellCenter(c: GridCoordinate): WorldPoint;
}

export interface ObstacleMutator {
  clearTile(c: GridCoordinate): void;
}

/** A layer whose tiles may stop movement, paired with the rule that says which ones do. */
export interface ObstacleLayer {
  readonly kind: ObstacleKind;
  readonly tiles: TileLayerSource & ObstacleMutator;
}

export function blocksAt(layer: ObstacleLayer, c: GridCoordinate): boolean {
  const index = layer.tiles.tileAt(c);
  return index !== null && layer.kind.isBlockingTile(index);
}
