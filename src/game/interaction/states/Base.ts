// src/game/interaction/states/Base.ts
import type { InteractionStateId } from '../InteractionTypes';
import type { ObstacleInteractionController } from '../ObstacleInteractionController';

export abstract class InteractionState {
  abstract readonly id: InteractionStateId;
  enter(_c: ObstacleInteractionController): void {}
  exit(_c: ObstacleInteractionController): void {}
  abstract update(c: ObstacleInteractionController, dtMs: number): void;
}
