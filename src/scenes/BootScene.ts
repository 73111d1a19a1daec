import Phaser from 'phaser';
import { MAP_CONFIG, TILE_COLORS, TILE_SIZE, TileIndex } from '../game/config';

const TILE_ORDER: TileIndex[] = [
  TileIndex.Empty,
  TileIndex.Grass,
  TileIndex.Stone,
  TileIndex.TreeTrunk,
  TileIndex.TreeCanopy,
];

/** Loads the map layout and paints the placeholder textures, then starts the game. */
export class BootScene extends Phaser.Scene {
  constructor() {
    super('Boot');
  }

  preload(): void {
    this.load.json(MAP_CONFIG.key, MAP_CONFIG.url);
  }

  create(): void {
    this.createTilesetTexture();
    this.createAgentTexture();
    this.scene.start('Game');
  }

  /** One TILE_SIZE square per tile index, laid out left to right in index order. */
  private createTilesetTexture(): void {
    const g = this.make.graphics({ x: 0, y: 0 }, false);
    TILE_ORDER.forEach((index) => {
      const x = index * TILE_SIZE;
      if (index === TileIndex.TreeCanopy) {
        g.fillStyle(TILE_COLORS[index], 0.85).fillCircle(x + TILE_SIZE / 2, TILE_SIZE / 2, TILE_SIZE / 2);
        return;
      }
      g.fillStyle(TILE_COLORS[index], 1).fillRect(x, 0, TILE_SIZE, TILE_SIZE);
    });
    g.generateTexture(MAP_CONFIG.tilesetKey, TILE_ORDER.length * TILE_SIZE, TILE_SIZE);
    g.destroy();
  }

  private createAgentTexture(): void {
    const g = this.make.graphics({ x: 0, y: 0 }, false);
    g.fillStyle(0xffe066, 1).fillCircle(TILE_SIZE / 2, TILE_SIZE / 2, TILE_SIZE * 0.4);
    g.lineStyle(1, 0x000000, 1).strokeCircle(TILE_SIZE / 2, TILE_SIZE / 2, TILE_SIZE * 0.4);
    g.generateTexture(MAP_CONFIG.agentKey, TILE_SIZE, TILE_SIZE);
    g.destroy();
  }
}
