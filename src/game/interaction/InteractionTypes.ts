import type { GridCoordinate, Route } from '../grid/GridTypes';

export enum InteractionStateId {
  Idle = 'idle',
  Moving = 'moving',
  Breaking = 'breaking',
}

/** Walks a route; the controller only swaps routes and watches for completion. */
export interface RouteFollower {
  /** Replace whatever route is being followed. */
  follow(route: Route): void;
  /** Waypoints not yet reached, next one first. */
  remaining(): readonly GridCoordinate[];
  stop(): void;
}

export interface AgentLocator {
  currentCell(): GridCoordinate;
}

export type MoveOutcome = 'accepted' | 'no-path';

export type BreakOutcome = 'accepted' | 'no-obstacle' | 'unreachable' | 'no-path';
