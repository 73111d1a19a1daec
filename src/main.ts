import Phaser from 'phaser';
import { BootScene } from './scenes/BootScene';
import { GameScene } from './scenes/GameScene';

/** Resize-to-window, pixel art, no physics: the grid does all the collision work. */
new Phaser.Game({
  type: Phaser.AUTO,
  parent: 'app',
  width: 800,
  height: 600,
  backgroundColor: 0x1b2630,
  pixelArt: true,
  scale: { mode: Phaser.Scale.RESIZE },
  scene: [BootScene, GameScene],
});
