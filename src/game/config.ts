import type { GridCoordinate } from './grid/GridTypes';

export const TILE_SIZE = 16;

/** Cells of padding added around the union of layer extents. */
export const GRID_MARGIN = 2;

export const BREAK_DELAY_MS = 500;

/** 1 => a 3x3 scan around the clicked cell when looking for an obstacle root. */
export const ROOT_SCAN_RADIUS = 1;

export const AGENT_SPEED_PX_PER_SEC = 48;

export type NeighborhoodKind = 'four' | 'eight';
export const DEFAULT_NEIGHBORHOOD: NeighborhoodKind = 'eight';

/**
 * What happens to a break that was pending or already scheduled when a newer
 * request comes in.
 *  - cancel: the older break is dropped.
 *  - fire:   the older break still runs against the root it recorded.
 */
export type BreakSupersedePolicy = 'cancel' | 'fire';
export const BREAK_SUPERSEDE_POLICY: BreakSupersedePolicy = 'cancel';

export const MAP_CONFIG = {
  key: 'meadow-map',
  url: 'maps/meadow.json',
  tilesetName: 'meadow-tiles',
  tilesetKey: 'meadow-tiles',
  agentKey: 'agent',
};

export enum TileIndex {
  Empty = 0,
  Grass = 1,
  Stone = 2,
  TreeTrunk = 3,
  TreeCanopy = 4,
}

/** Fill colour per tile index, used to paint the generated tileset texture. */
export const TILE_COLORS: Record<TileIndex, number> = {
  [TileIndex.Empty]: 0x000000,
  [TileIndex.Grass]: 0x4f8a3c,
  [TileIndex.Stone]: 0x8a8f98,
  [TileIndex.TreeTrunk]: 0x6b4423,
  [TileIndex.TreeCanopy]: 0x2e6b2a,
};

export interface ObstacleKind {
  readonly name: string;
  /** Only tiles for which this returns true stop movement. */
  isBlockingTile(index: number): boolean;
  /** Offsets from the root cell to decorative cells that belong to the same obstacle. */
  readonly decorationOffsets: readonly GridCoordinate[];
}

export const OBSTACLE_KINDS = {
  stone: {
    name: 'stone',
    isBlockingTile: () => true,
    decorationOffsets: [],
  },
  // Canopy sits one row above the trunk and never blocks.
  tree: {
    name: 'tree',
    isBlockingTile: (index: number) => index === TileIndex.TreeTrunk,
    decorationOffsets: [{ x: 0, y: -1 }],
  },
} satisfies Record<string, ObstacleKind>;

// ---- DEBUG / LOGGING toggles ------------------------------------------------
export const DEBUG_GRID = false;
export const LOG_PATHFINDING = false;
export const LOG_INTERACTION = false;

export const UI_COLORS = {
  routeLine: 0xffffff,
  blockedCell: 0xff4444,
  breakTarget: 0xffaa00,
  hud: '#ffff00',
};
