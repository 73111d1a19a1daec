import Phaser from 'phaser';
import { DEBUG_GRID, MAP_CONFIG, OBSTACLE_KINDS, TILE_SIZE, UI_COLORS } from '../game/config';
import { GridDebugOverlay } from '../game/debug/GridDebugOverlay';
import { InteractionDebugHUD } from '../game/debug/InteractionDebugHUD';
import type { ArrayTileLayer } from '../game/grid/ArrayTileLayer';
import { sameCell } from '../game/grid/GridTypes';
import type { GridCoordinate } from '../game/grid/GridTypes';
import { NavigationGrid } from '../game/grid/NavigationGrid';
import { ObstacleInteractionController } from '../game/interaction';
import { createMapLayers, findSpawnCell, mapSize, parseMapLayout } from '../game/map/MapLayout';
import { RouteMover } from '../game/movement/RouteMover';
import { PathFinder } from '../game/pathfinding/PathFinder';
import { PhaserTileLayer } from '../game/tiles/PhaserTileLayer';

const HIGHLIGHT_ALPHA = 0.5;

export class GameScene extends Phaser.Scene {
  private map!: Phaser.Tilemaps.Tilemap;
  private ground!: PhaserTileLayer;
  private stones!: PhaserTileLayer;
  private trees!: PhaserTileLayer;
  private agent!: Phaser.GameObjects.Image;
  private mover!: RouteMover;
  private navigation!: NavigationGrid;
  private controller!: ObstacleInteractionController;
  private routeLine!: Phaser.GameObjects.Graphics;
  private overlay!: GridDebugOverlay;
  private hud!: InteractionDebugHUD;
  private hovered: GridCoordinate | null = null;
  private debug = DEBUG_GRID;

  constructor() {
    super('Game');
  }

  create(): void {
    const layout = parseMapLayout(this.cache.json.get(MAP_CONFIG.key));
    const source = createMapLayers(layout);
    const { width, height } = mapSize(layout);

    this.map = this.make.tilemap({ tileWidth: TILE_SIZE, tileHeight: TILE_SIZE, width, height });
    const tileset = this.map.addTilesetImage(MAP_CONFIG.tilesetName, MAP_CONFIG.tilesetKey, TILE_SIZE, TILE_SIZE, 0, 0, 0);
    if (!tileset) {
      throw new Error('Failed to create meadow tileset.');
    }

    this.ground = this.createLayer('ground', tileset, source.ground, 1);
    this.stones = this.createLayer('stones', tileset, source.stones, 5);
    this.trees = this.createLayer('trees', tileset, source.trees, 30);

    const spawn = this.ground.cellCenter(findSpawnCell(layout));
    this.agent = this.add.image(spawn.x, spawn.y, MAP_CONFIG.agentKey).setDepth(20);
    this.mover = new RouteMover(this.ground, this.agent);

    // Pathfinding grid + interaction wiring
    this.navigation = new NavigationGrid(this.ground, [
      { kind: OBSTACLE_KINDS.stone, tiles: this.stones },
      { kind: OBSTACLE_KINDS.tree, tiles: this.trees },
    ]);
    this.controller = new ObstacleInteractionController({
      navigation: this.navigation,
      pathFinder: new PathFinder(),
      mover: this.mover,
      agent: this.mover,
    });

    this.routeLine = this.add.graphics().setDepth(25);
    this.overlay = new GridDebugOverlay(this, TILE_SIZE, (c) => this.ground.cellCenter(c));
    this.hud = new InteractionDebugHUD(this);
    this.setDebug(this.debug);

    this.cameras.main.setZoom(2);
    this.cameras.main.centerOn((width * TILE_SIZE) / 2, (height * TILE_SIZE) / 2);
    this.scale.on('resize', (size: Phaser.Structs.Size) => this.hud.layout(size.width));

    this.configureInput();
  }

  update(_time: number, deltaMs: number): void {
    this.mover.step(deltaMs);
    this.controller.advance(deltaMs);
    this.drawRoute();
    if (this.debug) {
      this.hud.update(this.controller);
      this.overlay.draw(this.navigation.current, this.navigation.version, this.controller.breakTarget());
    }
  }

  private createLayer(name: string, tileset: Phaser.Tilemaps.Tileset, source: ArrayTileLayer, depth: number): PhaserTileLayer {
    const layer = this.map.createBlankLayer(name, tileset);
    if (!layer) {
      throw new Error(`Failed to create layer: ${name}`);
    }
    source.forEachTile((c, index) => layer.putTileAt(index, c.x, c.y));
    layer.setDepth(depth);
    return new PhaserTileLayer(layer);
  }

  private configureInput(): void {
    this.input.mouse?.disableContextMenu();

    this.input.on('pointermove', (pointer: Phaser.Input.Pointer) => {
      this.setHovered(this.pointerCell(pointer));
    });

    this.input.on('pointerdown', (pointer: Phaser.Input.Pointer) => {
      const cell = this.pointerCell(pointer);
      if (pointer.rightButtonDown()) {
        this.controller.requestBreak(cell);
      } else if (pointer.leftButtonDown()) {
        this.controller.requestMove(cell);
      }
    });

    this.input.keyboard?.on('keydown-G', () => this.setDebug(!this.debug));
  }

  private pointerCell(pointer: Phaser.Input.Pointer): GridCoordinate {
    return this.ground.worldToCell({ x: pointer.worldX, y: pointer.worldY });
  }

  private setHovered(cell: GridCoordinate): void {
    if (this.hovered && sameCell(this.hovered, cell)) return;
    if (this.hovered) this.highlight(this.hovered, null);
    this.hovered = cell;
    this.highlight(cell, HIGHLIGHT_ALPHA);
  }

  private highlight(cell: GridCoordinate, alpha: number | null): void {
    for (const layer of [this.ground, this.stones, this.trees]) {
      if (layer.hasTile(cell)) layer.setHighlight(cell, alpha);
    }
  }

  /** Agent position through every waypoint still ahead of it. */
  private drawRoute(): void {
    const remaining = this.mover.remaining();
    this.routeLine.clear();
    if (remaining.length === 0) return;

    this.routeLine.lineStyle(2, UI_COLORS.routeLine, 0.8);
    this.routeLine.beginPath();
    this.routeLine.moveTo(this.agent.x, this.agent.y);
    for (const c of remaining) {
      const p = this.ground.cellCenter(c);
      this.routeLine.lineTo(p.x, p.y);
    }
    this.routeLine.strokePath();
  }

  private setDebug(on: boolean): void {
    this.debug = on;
    this.overlay.setVisible(on);
    this.hud.setVisible(on);
  }
}
