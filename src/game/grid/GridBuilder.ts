import { GRID_MARGIN } from '../config';
import { GridModel } from './GridModel';
import { EMPTY_BOUNDS, padBounds, unionBounds } from './GridTypes';
import type { CellBounds, GridCoordinate } from './GridTypes';
import { blocksAt } from './TileLayerSource';
import type { ObstacleLayer, TileLayerSource } from './TileLayerSource';

export type GridBuilderOptions = {
  /** Padding around the union of layer extents. Default GRID_MARGIN. */
  margin?: number;
};

/**
 * Samples tile layers into a fresh GridModel. Never patches an existing grid:
 * every call walks the whole padded extent.
 */
export class GridBuilder {
  private margin: number;

  constructor(opts: GridBuilderOptions = {}) {
    this.margin = opts.margin ?? GRID_MARGIN;
    if (this.margin < 0) throw new Error(`Grid margin must be >= 0, got ${this.margin}`);
  }

  build(walkableLayer: TileLayerSource, obstacleLayers: readonly ObstacleLayer[]): GridModel {
    const bounds = this.computeBounds(walkableLayer, obstacleLayers);
    return new GridModel(bounds, (c) => isWalkableCell(c, walkableLayer, obstacleLayers));
  }

  computeBounds(walkableLayer: TileLayerSource, obstacleLayers: readonly ObstacleLayer[]): CellBounds {
    let bounds: CellBounds = unionBounds(EMPTY_BOUNDS, walkableLayer.bounds());
    for (const layer of obstacleLayers) {
      bounds = unionBounds(bounds, layer.tiles.bounds());
    }
    return padBounds(bounds, this.margin);
  }
}

export function isWalkableCell(
  c: GridCoordinate,
  walkableLayer: TileLayerSource,
  obstacleLayers: readonly ObstacleLayer[],
): boolean {
  if (!walkableLayer.hasTile(c)) return false;
  return !obstacleLayers.some((layer) => blocksAt(layer, c));
}
