// src/game/interaction/states/MovingState.ts
import { InteractionState } from './Base';
import { InteractionStateId } from '../InteractionTypes';
import type { ObstacleInteractionController } from '../ObstacleInteractionController';

export class MovingState extends InteractionState {
  readonly id = InteractionStateId.Moving;

  update(c: ObstacleInteractionController, _dtMs: number): void {
    // The mover does the stepping; we only watch for the queue running dry.
    if (c.mover.remaining().length > 0) return;

    if (c.schedulePendingBreak()) {
      c.setState(InteractionStateId.Breaking, 'arrived next to obstacle');
    } else {
      c.setState(InteractionStateId.Idle, 'route complete');
    }
  }
}
