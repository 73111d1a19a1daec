import { TILE_SIZE } from '../config';
import type { ObstacleMutator, TileLayerSource } from './TileLayerSource';
import { boundsContain, cellKey } from './GridTypes';
import type { CellBounds, GridCoordinate, WorldPoint } from './GridTypes';

export type ArrayTileLayerOptions = {
  width: number;
  height: number;
  /** Cell of the top-left corner. Default 0,0. */
  originX?: number;
  originY?: number;
  tileSize?: number;
};

/** Fixed-extent tile layer kept in memory; world origin sits at cell 0,0. */
export class ArrayTileLayer implements TileLayerSource, ObstacleMutator {
  readonly tileSize: number;
  private readonly extent: CellBounds;
  private tiles = new Map<string, number>();

  constructor(opts: ArrayTileLayerOptions) {
    if (opts.width < 0 || opts.height < 0) {
      throw new Error(`Invalid layer size ${opts.width}x${opts.height}`);
    }
    this.tileSize = opts.tileSize ?? TILE_SIZE;
    this.extent = { x: opts.originX ?? 0, y: opts.originY ?? 0, width: opts.width, height: opts.height };
  }

  putTile(c: GridCoordinate, index: number): void {
    if (!boundsContain(this.extent, c)) {
      throw new Error(`Tile ${cellKey(c)} is outside the layer`);
    }
    this.tiles.set(cellKey(c), index);
  }

  clearTile(c: GridCoordinate): void {
    this.tiles.delete(cellKey(c));
  }

  hasTile(c: GridCoordinate): boolean {
    return this.tiles.has(cellKey(c));
  }

  tileAt(c: GridCoordinate): number | null {
    return this.tiles.get(cellKey(c)) ?? null;
  }

  bounds(): CellBounds {
    return { ...this.extent };
  }

  get tileCount(): number {
    return this.tiles.size;
  }

  /** Visits tiles in row-major order. */
  forEachTile(fn: (c: GridCoordinate, index: number) => void): void {
    const { x, y, width, height } = this.extent;
    for (let cy = y; cy < y + height; cy++) {
      for (let cx = x; cx < x + width; cx++) {
        const index = this.tiles.get(cx + ',' + cy);
        if (index !== undefined) fn({ x: cx, y: cy }, index);
      }
    }
  }

  worldToCell(p: WorldPoint): GridCoordinate {
    return { x: Math.floor(p.x / this.tileSize), y: Math.floor(p.y / this.tileSize) };
  }

  cellCenter(c: GridCoordinate): WorldPoint {
    return { x: c.x * this.tileSize + this.tileSize / 2, y: c.y * this.tileSize + this.tileSize / 2 };
  }
}
