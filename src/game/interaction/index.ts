// src/game/interaction/index.ts
export { InteractionStateId } from './InteractionTypes';
export type { AgentLocator, RouteFollower, MoveOutcome, BreakOutcome } from './InteractionTypes';

export { ObstacleInteractionController } from './ObstacleInteractionController';
export type { InteractionDeps, InteractionOptions } from './ObstacleInteractionController';
export { locateObstacleRoot, nearestWalkableAdjacent, obstacleFootprint } from './ObstacleLocator';
export type { ObstacleHit } from './ObstacleLocator';
