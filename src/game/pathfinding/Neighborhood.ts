import type { NeighborhoodKind } from '../config';
import type { GridCoordinate } from '../grid/GridTypes';

export interface Neighborhood {
  readonly kind: NeighborhoodKind;
  readonly offsets: readonly GridCoordinate[];
  /** Cost of one step between two adjacent cells. */
  stepCost(a: GridCoordinate, b: GridCoordinate): number;
  /** Estimate to the goal; consistent with stepCost. */
  heuristic(a: GridCoordinate, b: GridCoordinate): number;
}

const ORTHOGONAL: readonly GridCoordinate[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
];

const DIAGONAL: readonly GridCoordinate[] = [
  { x: 1, y: 1 },
  { x: -1, y: -1 },
  { x: -1, y: 1 },
  { x: 1, y: -1 },
];

function manhattanCost(a: GridCoordinate, b: GridCoordinate): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

// Diagonal and straight steps cost the same: 10 per step.
function chebyshevCost(a: GridCoordinate, b: GridCoordinate): number {
  return 10 * Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export const NEIGHBORHOODS: Record<NeighborhoodKind, Neighborhood> = {
  four: {
    kind: 'four',
    offsets: ORTHOGONAL,
    stepCost: manhattanCost,
    heuristic: manhattanCost,
  },
  eight: {
    kind: 'eight',
    offsets: [...ORTHOGONAL, ...DIAGONAL],
    stepCost: chebyshevCost,
    heuristic: chebyshevCost,
  },
};
