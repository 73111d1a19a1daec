// src/game/interaction/states/IdleState.ts
import { InteractionState } from './Base';
import { InteractionStateId } from '../InteractionTypes';
import type { ObstacleInteractionController } from '../ObstacleInteractionController';

/** Nothing to do until a request comes in. */
export class IdleState extends InteractionState {
  readonly id = InteractionStateId.Idle;

  update(_c: ObstacleInteractionController, _dtMs: number): void {}
}
