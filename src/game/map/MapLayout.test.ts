import { describe, it, expect } from 'vitest';
import { TileIndex } from '../config';
import { createMapLayers, findSpawnCell, mapSize, parseMapLayout } from './MapLayout';

const layout = (rows: string[]) => parseMapLayout({ name: 'm', rows });

describe('parseMapLayout', () => {
  it('accepts a rectangular map', () => {
    const m = layout(['.S~', 'T@.']);
    expect(m.name).toBe('m');
    expect(mapSize(m)).toEqual({ width: 3, height: 2 });
  });

  it('rejects ragged rows', () => {
    expect(() => layout(['...', '..'])).toThrow('all rows must have the same length');
  });

  it('rejects unknown characters', () => {
    expect(() => layout(['..X'])).toThrow('unknown map character');
  });

  it('rejects a map without rows', () => {
    expect(() => layout([])).toThrow();
  });
});

describe('createMapLayers', () => {
  it('puts ground under everything but water', () => {
    const layers = createMapLayers(layout(['.S~', 'T@.']));
    expect(layers.ground.tileCount).toBe(5);
    expect(layers.ground.hasTile({ x: 2, y: 0 })).toBe(false);
    expect(layers.stones.tileAt({ x: 1, y: 0 })).toBe(TileIndex.Stone);
    expect(layers.trees.tileAt({ x: 0, y: 1 })).toBe(TileIndex.TreeTrunk);
    expect(layers.trees.tileAt({ x: 0, y: 0 })).toBe(TileIndex.TreeCanopy);
    expect(layers.trees.tileCount).toBe(2);
  });

  it('drops a canopy that would fall off the top edge', () => {
    const layers = createMapLayers(layout(['T']));
    expect(layers.trees.tileCount).toBe(1);
  });

  it('never covers a trunk with the canopy of the tree below', () => {
    const layers = createMapLayers(layout(['T', 'T']));
    expect(layers.trees.tileAt({ x: 0, y: 0 })).toBe(TileIndex.TreeTrunk);
    expect(layers.trees.tileAt({ x: 0, y: 1 })).toBe(TileIndex.TreeTrunk);
    expect(layers.trees.tileCount).toBe(2);
  });

  it('uses the given tile size', () => {
    const layers = createMapLayers(layout(['..']), 32);
    expect(layers.ground.cellCenter({ x: 1, y: 0 })).toEqual({ x: 48, y: 16 });
  });
});

describe('findSpawnCell', () => {
  it('prefers the marked spawn', () => {
    expect(findSpawnCell(layout(['.S', '.@']))).toEqual({ x: 1, y: 1 });
  });

  it('falls back to the first grass cell', () => {
    expect(findSpawnCell(layout(['S.', '..']))).toEqual({ x: 1, y: 0 });
  });

  it('throws when nothing is walkable', () => {
    expect(() => findSpawnCell(layout(['~S']))).toThrow('Map "m" has no walkable spawn cell');
  });
});
