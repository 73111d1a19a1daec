import { AGENT_SPEED_PX_PER_SEC } from '../config';
import type { GridCoordinate, Route, WorldPoint } from '../grid/GridTypes';
import type { TileLayerSource } from '../grid/TileLayerSource';
import type { AgentLocator, RouteFollower } from '../interaction/InteractionTypes';

export type RouteMoverOptions = {
  /** Speed in pixels/second. Default AGENT_SPEED_PX_PER_SEC. */
  speedPxPerSec?: number;
  /** Distance at which a waypoint counts as reached. Default tileSize / 10. */
  snapTolerancePx?: number;
};

/**
 * Moves a body through route waypoints one cell center at a time. The body
 * is any mutable {x, y} (a sprite works); step() writes to it directly.
 */
export class RouteMover implements RouteFollower, AgentLocator {
  private queue: GridCoordinate[] = [];
  private speedPx: number;
  private snapTol: number;

  constructor(
    private readonly layer: TileLayerSource,
    private readonly body: WorldPoint,
    opts: RouteMoverOptions = {},
  ) {
    this.speedPx = opts.speedPxPerSec ?? AGENT_SPEED_PX_PER_SEC;
    this.snapTol = opts.snapTolerancePx ?? layer.tileSize / 10;
    if (this.speedPx <= 0) throw new Error(`Mover speed must be > 0, got ${this.speedPx}`);
  }

  /** An empty route still walks the body back onto its cell's centre. */
  follow(route: Route): void {
    if (route.length === 0) {
      const here = this.currentCell();
      const c = this.layer.cellCenter(here);
      this.queue = c.x === this.body.x && c.y === this.body.y ? [] : [here];
      return;
    }
    this.queue = route.map((c) => ({ x: c.x, y: c.y }));
  }

  remaining(): readonly GridCoordinate[] {
    return this.queue;
  }

  stop(): void {
    this.queue = [];
  }

  currentCell(): GridCoordinate {
    return this.layer.worldToCell(this.body);
  }

  setSpeedPxPerSec(px: number): void {
    if (px <= 0) throw new Error(`Mover speed must be > 0, got ${px}`);
    this.speedPx = px;
  }

  /** Advance the body by dt; at most one waypoint is consumed per call. */
  step(dtMs: number): void {
    const next = this.queue[0];
    if (!next) return;

    const target = this.layer.cellCenter(next);
    const dx = target.x - this.body.x;
    const dy = target.y - this.body.y;
    const dist = Math.hypot(dx, dy);
    const travel = (this.speedPx * dtMs) / 1000;

    if (travel >= dist) {
      this.body.x = target.x;
      this.body.y = target.y;
    } else {
      this.body.x += (dx / dist) * travel;
      this.body.y += (dy / dist) * travel;
    }

    if (Math.hypot(target.x - this.body.x, target.y - this.body.y) < this.snapTol) {
      this.body.x = target.x; // snap exactly
      this.body.y = target.y;
      this.queue.shift();
    }
  }
}
