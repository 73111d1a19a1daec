import { boundsContain, isEmptyBounds } from './GridTypes';
import type { CellBounds, GridCoordinate } from './GridTypes';

export const NO_CELL = -1;

/**
 * One grid cell. `walkable` is fixed when the grid is built; the cost fields
 * and `cameFrom` are scratch state owned by whichever search runs next.
 */
export class Cell {
  gCost = Infinity;
  hCost = 0;
  fCost = Infinity;
  /** Arena index of the predecessor on the best known path, or NO_CELL. */
  cameFrom = NO_CELL;

  constructor(
    readonly index: number,
    readonly coordinate: Readonly<GridCoordinate>,
    readonly walkable: boolean,
  ) {}

  calculateFCost(): void {
    this.fCost = this.gCost + this.hCost;
  }

  resetSearch(): void {
    this.gCost = Infinity;
    this.hCost = 0;
    this.fCost = Infinity;
    this.cameFrom = NO_CELL;
  }
}

/** Arena of cells covering a rectangle, addressed by coordinate or by index. */
export class GridModel {
  private readonly cells: Cell[];

  constructor(readonly bounds: Readonly<CellBounds>, walkableAt: (c: GridCoordinate) => boolean) {
    const size = isEmptyBounds(bounds) ? 0 : bounds.width * bounds.height;
    this.cells = new Array<Cell>(size);
    for (let i = 0; i < size; i++) {
      const coordinate = {
        x: bounds.x + (i % bounds.width),
        y: bounds.y + Math.floor(i / bounds.width),
      };
      this.cells[i] = new Cell(i, coordinate, walkableAt(coordinate));
    }
  }

  get size(): number {
    return this.cells.length;
  }

  contains(c: GridCoordinate): boolean {
    return boundsContain(this.bounds, c);
  }

  indexOf(c: GridCoordinate): number {
    if (!this.contains(c)) return NO_CELL;
    return (c.y - this.bounds.y) * this.bounds.width + (c.x - this.bounds.x);
  }

  cellAt(c: GridCoordinate): Cell | null {
    const i = this.indexOf(c);
    return i === NO_CELL ? null : this.cells[i];
  }

  cellByIndex(index: number): Cell {
    const cell = this.cells[index];
    if (!cell) throw new Error(`No cell at index ${index}`);
    return cell;
  }

  /** Out-of-bounds coordinates are never walkable. */
  isWalkable(c: GridCoordinate): boolean {
    return this.cellAt(c)?.walkable ?? false;
  }

  resetSearchState(): void {
    for (const cell of this.cells) cell.resetSearch();
  }

  forEachCell(fn: (cell: Cell) => void): void {
    this.cells.forEach(fn);
  }
}
