import type Phaser from 'phaser';
import { UI_COLORS } from '../config';
import type { GridModel } from '../grid/GridModel';
import { cellKey } from '../grid/GridTypes';
import type { GridCoordinate, WorldPoint } from '../grid/GridTypes';

type CellToWorld = (c: GridCoordinate) => WorldPoint;

/** Remembers what the overlay last drew: grid version and target cell. */
export class OverlayStamp {
  private version = -1;
  private target: string | null = null;

  /** True (and records the new stamp) when either part differs from the last one. */
  changed(version: number, target: GridCoordinate | null): boolean {
    const key = target ? cellKey(target) : null;
    if (version === this.version && key === this.target) return false;
    this.version = version;
    this.target = key;
    return true;
  }

  reset(): void {
    this.version = -1;
    this.target = null;
  }
}

/** Outlines every blocked cell of a grid snapshot plus the current break target. */
export class GridDebugOverlay {
  private gfx: Phaser.GameObjects.Graphics;
  private stamp = new OverlayStamp();

  constructor(scene: Phaser.Scene, private readonly tileSize: number, private readonly cellCenter: CellToWorld) {
    this.gfx = scene.add.graphics().setDepth(1000);
  }

  setVisible(v: boolean) {
    this.gfx.setVisible(v);
    // force a redraw next time we become visible
    if (!v) this.stamp.reset();
  }

  /** Redraws only when the grid version or the target changed. */
  draw(grid: GridModel, version: number, target: GridCoordinate | null): void {
    if (!this.gfx.visible) return;
    if (!this.stamp.changed(version, target)) return;

    const half = this.tileSize / 2;
    this.gfx.clear();
    this.gfx.lineStyle(1, UI_COLORS.blockedCell, 0.6);
    grid.forEachCell((cell) => {
      if (cell.walkable) return;
      const c = this.cellCenter(cell.coordinate);
      this.gfx.strokeRect(c.x - half, c.y - half, this.tileSize, this.tileSize);
    });

    if (target) {
      const c = this.cellCenter(target);
      this.gfx.lineStyle(2, UI_COLORS.breakTarget, 1).strokeRect(c.x - half, c.y - half, this.tileSize, this.tileSize);
    }
  }

  destroy(): void {
    this.gfx.destroy();
  }
}
