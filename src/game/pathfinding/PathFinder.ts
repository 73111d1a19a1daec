import { DEFAULT_NEIGHBORHOOD, LOG_PATHFINDING } from '../config';
import type { NeighborhoodKind } from '../config';
import { NO_CELL } from '../grid/GridModel';
import type { Cell, GridModel } from '../grid/GridModel';
import { cellKey, sameCell } from '../grid/GridTypes';
import type { GridCoordinate, Route } from '../grid/GridTypes';
import { NEIGHBORHOODS } from './Neighborhood';
import type { Neighborhood } from './Neighborhood';

export type PathSearchStatus = 'found' | 'no-path' | 'invalid-endpoint' | 'budget-exhausted';

export interface PathSearchResult {
  status: PathSearchStatus;
  /** Empty unless status is 'found'. */
  route: Route;
  /** Summed step cost of the route (0 if none). */
  cost: number;
  /** Cells moved to the closed set. */
  nodesExplored: number;
}

export type PathFinderOptions = {
  neighborhood?: NeighborhoodKind;
  /** Give up after closing this many cells. Default: unbounded. */
  maxExplored?: number;
  log?: boolean;
};

/** A* over a GridModel. Failure to find a path is a result, never a throw. */
export class PathFinder {
  readonly neighborhood: Neighborhood;
  private maxExplored: number;
  private logEnabled: boolean;

  constructor(opts: PathFinderOptions = {}) {
    this.neighborhood = NEIGHBORHOODS[opts.neighborhood ?? DEFAULT_NEIGHBORHOOD];
    this.maxExplored = opts.maxExplored ?? Infinity;
    this.logEnabled = opts.log ?? LOG_PATHFINDING;
  }

  findPath(grid: GridModel, start: GridCoordinate, goal: GridCoordinate): Route | null {
    const result = this.search(grid, start, goal);
    return result.status === 'found' ? result.route : null;
  }

  search(grid: GridModel, start: GridCoordinate, goal: GridCoordinate): PathSearchResult {
    const startCell = grid.cellAt(start);
    const goalCell = grid.cellAt(goal);
    if (!startCell || !goalCell || !startCell.walkable || !goalCell.walkable) {
      return this.finish(start, goal, failure('invalid-endpoint', 0));
    }
    if (sameCell(start, goal)) {
      return this.finish(start, goal, { status: 'found', route: [], cost: 0, nodesExplored: 0 });
    }

    grid.resetSearchState();
    startCell.gCost = 0;
    startCell.hCost = this.neighborhood.heuristic(start, goal);
    startCell.calculateFCost();

    const open: Cell[] = [startCell];
    const inOpen = new Set<number>([startCell.index]);
    const closed = new Set<number>();

    while (open.length > 0) {
      const currentAt = lowestFCostIndex(open);
      const current = open[currentAt];

      if (current === goalCell) {
        const route = retrace(grid, startCell, goalCell);
        return this.finish(start, goal, {
          status: 'found',
          route,
          cost: goalCell.gCost,
          nodesExplored: closed.size,
        });
      }

      open.splice(currentAt, 1);
      inOpen.delete(current.index);
      closed.add(current.index);

      if (closed.size >= this.maxExplored) {
        return this.finish(start, goal, failure('budget-exhausted', closed.size));
      }

      for (const d of this.neighborhood.offsets) {
        const neighbor = grid.cellAt({ x: current.coordinate.x + d.x, y: current.coordinate.y + d.y });
        if (!neighbor || !neighbor.walkable || closed.has(neighbor.index)) continue;

        const tentativeG = current.gCost + this.neighborhood.stepCost(current.coordinate, neighbor.coordinate);
        if (tentativeG < neighbor.gCost) {
          neighbor.gCost = tentativeG;
          neighbor.hCost = this.neighborhood.heuristic(neighbor.coordinate, goal);
          neighbor.calculateFCost();
          neighbor.cameFrom = current.index;

          if (!inOpen.has(neighbor.index)) {
            open.push(neighbor);
            inOpen.add(neighbor.index);
          }
        }
      }
    }

    return this.finish(start, goal, failure('no-path', closed.size));
  }

  private finish(start: GridCoordinate, goal: GridCoordinate, result: PathSearchResult): PathSearchResult {
    if (this.logEnabled) {
      // eslint-disable-next-line no-console
      console.log(
        `[pathfinder] ${cellKey(start)} -> ${cellKey(goal)}: ${result.status}` +
        ` steps=${result.route.length} cost=${result.cost} explored=${result.nodesExplored}`
      );
    }
    return result;
  }
}

function failure(status: Exclude<PathSearchStatus, 'found'>, nodesExplored: number): PathSearchResult {
  return { status, route: [], cost: 0, nodesExplored };
}

// Strict '<' keeps the earliest-added cell on ties.
function lowestFCostIndex(open: Cell[]): number {
  let best = 0;
  for (let i = 1; i < open.length; i++) {
    if (open[i].fCost < open[best].fCost) best = i;
  }
  return best;
}

function retrace(grid: GridModel, start: Cell, end: Cell): Route {
  const route: Route = [];
  let current = end;
  while (current !== start) {
    route.push({ x: current.coordinate.x, y: current.coordinate.y });
    if (current.cameFrom === NO_CELL) {
      throw new Error(`Broken cameFrom chain at ${cellKey(current.coordinate)}`);
    }
    current = grid.cellByIndex(current.cameFrom);
  }
  route.reverse();
  return route;
}
