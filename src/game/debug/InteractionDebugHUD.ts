// src/game/debug/InteractionDebugHUD.ts
import type Phaser from 'phaser';
import { UI_COLORS } from '../config';
import { cellKey } from '../grid/GridTypes';
import { InteractionStateId } from '../interaction';
import type { ObstacleInteractionController } from '../interaction';

type Options = {
  width?: number;       // panel width
  margin?: number;      // margin from screen edges
  lineHeight?: number;  // text line height
};

export class InteractionDebugHUD {
  private container: Phaser.GameObjects.Container;
  private bg: Phaser.GameObjects.Rectangle;
  private text: Phaser.GameObjects.Text;

  private w: number;
  private margin: number;
  private lineH: number;

  constructor(scene: Phaser.Scene, opts: Options = {}) {
    this.w = opts.width ?? 240;
    this.margin = opts.margin ?? 8;
    this.lineH = opts.lineHeight ?? 16;

    this.container = scene.add.container(0, 0).setScrollFactor(0).setDepth(50);
    this.bg = scene.add.rectangle(0, 0, this.w, this.lineH * 4 + 8, 0x000000, 0.55).setOrigin(0, 0);
    this.text = scene.add
      .text(4, 4, '', { fontFamily: 'monospace', fontSize: '12px', color: UI_COLORS.hud })
      .setOrigin(0, 0);

    this.container.add([this.bg, this.text]);
    this.layout(scene.scale.width);
  }

  layout(screenW: number): void {
    // Top-right anchor
    this.container.setPosition(Math.max(0, screenW - this.w - this.margin), this.margin);
  }

  setVisible(v: boolean) { this.container.setVisible(v); }

  private stateColor(s: InteractionStateId): string {
    switch (s) {
      case InteractionStateId.Moving: return '#55aaff';
      case InteractionStateId.Breaking: return '#ffaa00';
      default: return UI_COLORS.hud;
    }
  }

  update(controller: ObstacleInteractionController): void {
    const state = controller.state();
    const target = controller.breakTarget();
    this.text.setColor(this.stateColor(state));
    this.text.setText([
      `state     : ${state}`,
      `agent     : ${cellKey(controller.agent.currentCell())}`,
      `target    : ${target ? cellKey(target) : '-'}`,
      `waypoints : ${controller.mover.remaining().length}  timers: ${controller.scheduledBreakCount()}`,
    ]);
  }

  destroy(): void {
    this.container.destroy(true);
  }
}
