import { LOG_PATHFINDING } from '../config';
import { GridBuilder } from './GridBuilder';
import type { GridModel } from './GridModel';
import type { ObstacleLayer, TileLayerSource } from './TileLayerSource';

/**
 * Holds the layers a grid is built from and the latest built snapshot.
 * regenerate() swaps in a brand new GridModel; readers holding the previous
 * one keep a consistent (if stale) view.
 */
export class NavigationGrid {
  private snapshot: GridModel;
  private builds = 0;

  constructor(
    readonly walkableLayer: TileLayerSource,
    readonly obstacleLayers: readonly ObstacleLayer[],
    private readonly builder: GridBuilder = new GridBuilder(),
    private readonly logEnabled: boolean = LOG_PATHFINDING,
  ) {
    this.snapshot = this.build();
  }

  get current(): GridModel {
    return this.snapshot;
  }

  /** Number of builds so far, the initial one included. */
  get version(): number {
    return this.builds;
  }

  regenerate(): GridModel {
    this.snapshot = this.build();
    return this.snapshot;
  }

  private build(): GridModel {
    const grid = this.builder.build(this.walkableLayer, this.obstacleLayers);
    this.builds++;
    if (this.logEnabled) {
      const b = grid.bounds;
      // eslint-disable-next-line no-console
      console.log(`[grid] build #${this.builds}: bounds=(${b.x},${b.y},${b.width}x${b.height}) cells=${grid.size}`);
    }
    return grid;
  }
}
