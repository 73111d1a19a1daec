export type GridCoordinate = { x: number; y: number };

export type WorldPoint = { x: number; y: number };

/** Rectangle of cells: origin inclusive, far edge exclusive. */
export type CellBounds = { x: number; y: number; width: number; height: number };

/** Ordered waypoints from start (exclusive) to goal (inclusive). */
export type Route = GridCoordinate[];

export const EMPTY_BOUNDS: CellBounds = { x: 0, y: 0, width: 0, height: 0 };

export function cellKey(c: GridCoordinate): string {
  return c.x + ',' + c.y;
}

export function sameCell(a: GridCoordinate, b: GridCoordinate): boolean {
  return a.x === b.x && a.y === b.y;
}

export function offsetCell(c: GridCoordinate, d: GridCoordinate): GridCoordinate {
  return { x: c.x + d.x, y: c.y + d.y };
}

export function manhattan(a: GridCoordinate, b: GridCoordinate): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function isEmptyBounds(b: CellBounds): boolean {
  return b.width <= 0 || b.height <= 0;
}

export function boundsContain(b: CellBounds, c: GridCoordinate): boolean {
  return c.x >= b.x && c.y >= b.y && c.x < b.x + b.width && c.y < b.y + b.height;
}

/** Smallest rectangle covering both; empty inputs are ignored. */
export function unionBounds(a: CellBounds, b: CellBounds): CellBounds {
  if (isEmptyBounds(a)) return isEmptyBounds(b) ? EMPTY_BOUNDS : { ...b };
  if (isEmptyBounds(b)) return { ...a };
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  const right = Math.max(a.x + a.width, b.x + b.width);
  const bottom = Math.max(a.y + a.height, b.y + b.height);
  return { x, y, width: right - x, height: bottom - y };
}

export function padBounds(b: CellBounds, margin: number): CellBounds {
  if (isEmptyBounds(b)) return EMPTY_BOUNDS;
  return { x: b.x - margin, y: b.y - margin, width: b.width + margin * 2, height: b.height + margin * 2 };
}
