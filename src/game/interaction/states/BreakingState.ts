// src/game/interaction/states/BreakingState.ts
import { InteractionState } from './Base';
import { InteractionStateId } from '../InteractionTypes';
import type { ObstacleInteractionController } from '../ObstacleInteractionController';

/** Waits for the break scheduled on arrival to fire (or be dropped). */
export class BreakingState extends InteractionState {
  readonly id = InteractionStateId.Breaking;

  update(c: ObstacleInteractionController, _dtMs: number): void {
    if (!c.isAwaitingBreak()) {
      c.setState(InteractionStateId.Idle, 'break resolved');
    }
  }
}
