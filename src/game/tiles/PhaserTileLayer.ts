import type Phaser from 'phaser';
import type { ObstacleMutator, TileLayerSource } from '../grid/TileLayerSource';
import type { CellBounds, GridCoordinate, WorldPoint } from '../grid/GridTypes';

/** Bridges a Phaser tilemap layer to the tile queries the grid builder and controller use. */
export class PhaserTileLayer implements TileLayerSource, ObstacleMutator {
  constructor(private readonly layer: Phaser.Tilemaps.TilemapLayer) {}

  get tileSize(): number {
    return this.layer.tilemap.tileWidth;
  }

  hasTile(c: GridCoordinate): boolean {
    return this.layer.hasTileAt(c.x, c.y);
  }

  tileAt(c: GridCoordinate): number | null {
    const tile = this.layer.getTileAt(c.x, c.y);
    return tile ? tile.index : null;
  }

  bounds(): CellBounds {
    return { x: 0, y: 0, width: this.layer.layer.width, height: this.layer.layer.height };
  }

  worldToCell(p: WorldPoint): GridCoordinate {
    return { x: this.layer.worldToTileX(p.x, true), y: this.layer.worldToTileY(p.y, true) };
  }

  cellCenter(c: GridCoordinate): WorldPoint {
    return {
      x: this.layer.tileToWorldX(c.x) + this.tileSize / 2,
      y: this.layer.tileToWorldY(c.y) + this.tileSize / 2,
    };
  }

  clearTile(c: GridCoordinate): void {
    this.layer.removeTileAt(c.x, c.y);
  }

  /** Tint every tile at this cell; null restores the default look. */
  setHighlight(c: GridCoordinate, alpha: number | null): void {
    this.layer.getTileAt(c.x, c.y)?.setAlpha(alpha ?? 1);
  }
}
