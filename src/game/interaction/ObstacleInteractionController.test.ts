import { describe, it, expect } from 'vitest';
import type { BreakSupersedePolicy } from '../config';
import type { GridCoordinate } from '../grid/GridTypes';
import { PathFinder } from '../pathfinding/PathFinder';
import { ScriptedMover, navigationFrom } from '../testing/gridFixtures';
import { RouteMover } from '../movement/RouteMover';
import { InteractionStateId } from './InteractionTypes';
import { ObstacleInteractionController } from './ObstacleInteractionController';

const STONE_FIELD = ['.....', '..S..', '.....'];
const STONE = { x: 2, y: 1 };

function setup(rows: string[], agentAt: GridCoordinate, policy: BreakSupersedePolicy = 'cancel') {
  const { layers, navigation } = navigationFrom(rows);
  const mover = new ScriptedMover(agentAt);
  const controller = new ObstacleInteractionController(
    { navigation, pathFinder: new PathFinder({ neighborhood: 'four' }), mover, agent: mover },
    { breakDelayMs: 500, supersedePolicy: policy, log: false },
  );
  return { layers, navigation, mover, controller };
}

describe('ObstacleInteractionController', () => {
  it('walks next to a stone, waits out the delay, then breaks it and rebuilds', () => {
    const { layers, navigation, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });

    expect(controller.requestBreak(STONE)).toBe('accepted');
    expect(controller.state()).toBe(InteractionStateId.Moving);
    expect(controller.pendingTarget()).toEqual(STONE);
    expect(mover.remaining()).toEqual([{ x: 1, y: 0 }, { x: 2, y: 0 }]);

    mover.stepOne();
    controller.advance(16);
    expect(controller.state()).toBe(InteractionStateId.Moving);

    mover.stepOne();
    controller.advance(16);
    expect(controller.state()).toBe(InteractionStateId.Breaking);
    expect(controller.pendingTarget()).toBeNull();
    expect(controller.breakTarget()).toEqual(STONE);
    expect(controller.scheduledBreakCount()).toBe(1);

    controller.advance(499);
    expect(controller.state()).toBe(InteractionStateId.Breaking);
    expect(layers.stones.hasTile(STONE)).toBe(true);
    expect(navigation.version).toBe(1);

    controller.advance(1);
    expect(controller.state()).toBe(InteractionStateId.Idle);
    expect(controller.breakTarget()).toBeNull();
    expect(layers.stones.hasTile(STONE)).toBe(false);
    expect(navigation.version).toBe(2);
    expect(navigation.current.isWalkable(STONE)).toBe(true);
  });

  it('breaks a tree from a canopy click and clears trunk and canopy', () => {
    const { layers, mover, controller } = setup(['.....', '..T..', '.....'], { x: 0, y: 2 });

    expect(controller.requestBreak({ x: 2, y: 0 })).toBe('accepted');
    expect(controller.pendingTarget()).toEqual({ x: 2, y: 1 });
    expect(mover.remaining()).toEqual([{ x: 1, y: 2 }, { x: 2, y: 2 }]);

    mover.arrive();
    controller.advance(10);
    controller.advance(500);

    expect(controller.state()).toBe(InteractionStateId.Idle);
    expect(layers.trees.hasTile({ x: 2, y: 1 })).toBe(false);
    expect(layers.trees.hasTile({ x: 2, y: 0 })).toBe(false);
  });

  it('drops a break on an obstacle boxed in by other obstacles', () => {
    const rows = ['.....', '..S..', '.SSS.', '..S..', '.....'];
    const { layers, navigation, mover, controller } = setup(rows, { x: 0, y: 0 });

    expect(controller.requestBreak({ x: 2, y: 2 })).toBe('unreachable');
    expect(controller.state()).toBe(InteractionStateId.Idle);
    expect(mover.followCalls).toBe(0);
    expect(layers.stones.hasTile({ x: 2, y: 2 })).toBe(true);
    expect(navigation.version).toBe(1);

    controller.advance(1000);
    expect(layers.stones.hasTile({ x: 2, y: 2 })).toBe(true);
    expect(navigation.version).toBe(1);
  });

  it('drops a break when the free side cannot be reached', () => {
    const { mover, controller } = setup(['..~..', '..~S.', '..~..'], { x: 0, y: 1 });
    expect(controller.requestBreak({ x: 3, y: 1 })).toBe('no-path');
    expect(controller.state()).toBe(InteractionStateId.Idle);
    expect(mover.followCalls).toBe(0);
  });

  it('ignores a break request on plain ground', () => {
    const { controller } = setup(STONE_FIELD, { x: 0, y: 0 });
    expect(controller.requestBreak({ x: 4, y: 2 })).toBe('no-obstacle');
    expect(controller.state()).toBe(InteractionStateId.Idle);
  });

  it('moves and returns to idle without breaking anything', () => {
    const { navigation, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });

    expect(controller.requestMove({ x: 4, y: 2 })).toBe('accepted');
    expect(controller.state()).toBe(InteractionStateId.Moving);
    expect(mover.remaining()).toHaveLength(6);

    mover.arrive();
    controller.advance(16);
    expect(controller.state()).toBe(InteractionStateId.Idle);
    expect(controller.scheduledBreakCount()).toBe(0);
    expect(navigation.version).toBe(1);
  });

  it('keeps the current route when a move has no path', () => {
    const { mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });
    controller.requestMove({ x: 4, y: 0 });
    const route = mover.remaining();

    expect(controller.requestMove(STONE)).toBe('no-path');
    expect(controller.state()).toBe(InteractionStateId.Moving);
    expect(mover.remaining()).toBe(route);
    expect(mover.followCalls).toBe(1);
  });

  it('rejects a negative break delay', () => {
    const { navigation } = navigationFrom(STONE_FIELD);
    const mover = new ScriptedMover({ x: 0, y: 0 });
    expect(() => new ObstacleInteractionController(
      { navigation, pathFinder: new PathFinder(), mover, agent: mover },
      { breakDelayMs: -5 },
    )).toThrow('Break delay must be >= 0, got -5');
  });

  describe('with a sprite-driving mover', () => {
    function walking(rows: string[], body: { x: number; y: number }) {
      const { layers, navigation } = navigationFrom(rows);
      const mover = new RouteMover(layers.ground, body, { speedPxPerSec: 160 });
      const controller = new ObstacleInteractionController(
        { navigation, pathFinder: new PathFinder({ neighborhood: 'four' }), mover, agent: mover },
        { breakDelayMs: 500, log: false },
      );
      return { layers, mover, controller };
    }

    it('settles on the cell centre when told to move to its own cell mid-step', () => {
      const body = { x: 24, y: 24 };
      const { mover, controller } = walking(['.....', '.....', '.....'], body);
      expect(controller.requestMove({ x: 3, y: 1 })).toBe('accepted');
      mover.step(30);
      controller.advance(30);
      expect(body).toEqual({ x: 28.8, y: 24 });

      expect(controller.requestMove(mover.currentCell())).toBe('accepted');
      for (let i = 0; i < 10; i++) {
        mover.step(16);
        controller.advance(16);
      }
      expect(body).toEqual({ x: 24, y: 24 });
      expect(controller.state()).toBe(InteractionStateId.Idle);
    });

    it('centres on the adjacent cell before waiting out the break', () => {
      const body = { x: 36, y: 8 };
      const { layers, mover, controller } = walking(STONE_FIELD, body);

      expect(controller.requestBreak(STONE)).toBe('accepted');
      expect(mover.remaining()).toEqual([{ x: 2, y: 0 }]);
      controller.advance(0);
      expect(controller.state()).toBe(InteractionStateId.Moving);

      mover.step(100);
      controller.advance(16);
      expect(body).toEqual({ x: 40, y: 8 });
      expect(controller.state()).toBe(InteractionStateId.Breaking);

      controller.advance(500);
      expect(layers.stones.hasTile(STONE)).toBe(false);
    });
  });

  describe("supersede policy 'cancel'", () => {
    it('forgets a pending break when a move comes in first', () => {
      const { layers, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });
      controller.requestBreak(STONE);

      expect(controller.requestMove({ x: 0, y: 2 })).toBe('accepted');
      expect(controller.pendingTarget()).toBeNull();

      mover.arrive();
      controller.advance(10);
      controller.advance(1000);
      expect(controller.state()).toBe(InteractionStateId.Idle);
      expect(layers.stones.hasTile(STONE)).toBe(true);
    });

    it('cancels a scheduled break when the agent is sent elsewhere', () => {
      const { layers, navigation, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });
      controller.requestBreak(STONE);
      mover.arrive();
      controller.advance(10);
      expect(controller.state()).toBe(InteractionStateId.Breaking);

      expect(controller.requestMove({ x: 4, y: 2 })).toBe('accepted');
      expect(controller.state()).toBe(InteractionStateId.Moving);
      expect(controller.scheduledBreakCount()).toBe(0);
      expect(controller.breakTarget()).toBeNull();

      controller.advance(1000);
      expect(layers.stones.hasTile(STONE)).toBe(true);
      expect(navigation.version).toBe(1);
    });

    it('restarts the delay when the same obstacle is requested again', () => {
      const { layers, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 });
      controller.requestBreak(STONE);
      mover.arrive();
      controller.advance(10);
      controller.advance(300);

      // Already adjacent: empty route, break scheduled on the next tick.
      expect(controller.requestBreak(STONE)).toBe('accepted');
      expect(mover.remaining()).toEqual([]);
      controller.advance(10);
      expect(controller.state()).toBe(InteractionStateId.Breaking);

      controller.advance(490);
      expect(layers.stones.hasTile(STONE)).toBe(true);
      controller.advance(10);
      expect(layers.stones.hasTile(STONE)).toBe(false);
      expect(controller.state()).toBe(InteractionStateId.Idle);
    });
  });

  describe("supersede policy 'fire'", () => {
    it('still breaks the recorded obstacle after a move supersedes the route', () => {
      const { layers, navigation, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 }, 'fire');
      controller.requestBreak(STONE);
      mover.arrive();
      controller.advance(10);

      expect(controller.requestMove({ x: 4, y: 2 })).toBe('accepted');
      expect(controller.state()).toBe(InteractionStateId.Moving);
      expect(controller.scheduledBreakCount()).toBe(1);

      controller.advance(500);
      expect(layers.stones.hasTile(STONE)).toBe(false);
      expect(navigation.version).toBe(2);
      expect(controller.state()).toBe(InteractionStateId.Moving);

      mover.arrive();
      controller.advance(10);
      expect(controller.state()).toBe(InteractionStateId.Idle);
    });

    it('keeps a pending break across a plain move', () => {
      const { layers, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 }, 'fire');
      controller.requestBreak(STONE);
      controller.requestMove({ x: 0, y: 2 });
      expect(controller.pendingTarget()).toEqual(STONE);

      mover.arrive();
      controller.advance(10);
      expect(controller.state()).toBe(InteractionStateId.Breaking);

      controller.advance(500);
      expect(layers.stones.hasTile(STONE)).toBe(false);
      expect(controller.state()).toBe(InteractionStateId.Idle);
    });

    it('skips a second break whose obstacle is already gone', () => {
      const { layers, navigation, mover, controller } = setup(STONE_FIELD, { x: 0, y: 0 }, 'fire');
      controller.requestBreak(STONE);
      mover.arrive();
      controller.advance(10);

      expect(controller.requestBreak(STONE)).toBe('accepted');
      controller.advance(10);
      expect(controller.scheduledBreakCount()).toBe(2);

      controller.advance(490);
      expect(layers.stones.hasTile(STONE)).toBe(false);
      expect(navigation.version).toBe(2);
      expect(controller.state()).toBe(InteractionStateId.Breaking);

      controller.advance(10);
      expect(navigation.version).toBe(2);
      expect(controller.state()).toBe(InteractionStateId.Idle);
    });
  });
});
