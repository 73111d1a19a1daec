import { BREAK_DELAY_MS, BREAK_SUPERSEDE_POLICY, LOG_INTERACTION, ROOT_SCAN_RADIUS } from '../config';
import type { BreakSupersedePolicy } from '../config';
import { cellKey } from '../grid/GridTypes';
import type { GridCoordinate, Route } from '../grid/GridTypes';
import type { NavigationGrid } from '../grid/NavigationGrid';
import { blocksAt } from '../grid/TileLayerSource';
import type { PathFinder } from '../pathfinding/PathFinder';
import { BreakScheduler } from './BreakScheduler';
import type { PendingBreak } from './BreakScheduler';
import { InteractionStateId } from './InteractionTypes';
import type { AgentLocator, BreakOutcome, MoveOutcome, RouteFollower } from './InteractionTypes';
import { locateObstacleRoot, nearestWalkableAdjacent, obstacleFootprint } from './ObstacleLocator';
import type { ObstacleHit } from './ObstacleLocator';
import { StateMachine } from './states/StateMachine';
import { IdleState } from './states/IdleState';
import { MovingState } from './states/MovingState';
import { BreakingState } from './states/BreakingState';

export interface InteractionDeps {
  navigation: NavigationGrid;
  pathFinder: PathFinder;
  mover: RouteFollower;
  agent: AgentLocator;
}

export type InteractionOptions = {
  breakDelayMs?: number;
  supersedePolicy?: BreakSupersedePolicy;
  rootScanRadius?: number;
  log?: boolean;
};

/**
 * Per-agent Idle -> Moving -> Breaking -> Idle machine.
 *
 * A break request routes the agent next to the obstacle and records a pending
 * break. When the route runs out the break is scheduled; once its delay has
 * elapsed the obstacle's cells are cleared and the navigation grid rebuilt.
 * Everything happens inside advance(), so the controller never blocks.
 *
 * Every accepted request bumps an epoch. Under the 'cancel' policy a pending
 * or scheduled break from an older epoch is dropped; under 'fire' it still
 * runs against the root it recorded.
 */
export class ObstacleInteractionController {
  readonly navigation: NavigationGrid;
  readonly pathFinder: PathFinder;
  readonly mover: RouteFollower;
  readonly agent: AgentLocator;

  private readonly policy: BreakSupersedePolicy;
  private readonly scanRadius: number;
  private readonly logEnabled: boolean;
  private readonly scheduler: BreakScheduler;
  private readonly fsm: StateMachine<ObstacleInteractionController, InteractionStateId>;

  private epoch = 0;
  private nextBreakId = 1;
  private pendingBreak: PendingBreak | null = null;
  private awaitedBreakId: number | null = null;

  constructor(deps: InteractionDeps, opts: InteractionOptions = {}) {
    this.navigation = deps.navigation;
    this.pathFinder = deps.pathFinder;
    this.mover = deps.mover;
    this.agent = deps.agent;

    this.policy = opts.supersedePolicy ?? BREAK_SUPERSEDE_POLICY;
    this.scanRadius = opts.rootScanRadius ?? ROOT_SCAN_RADIUS;
    this.logEnabled = opts.log ?? LOG_INTERACTION;
    this.scheduler = new BreakScheduler(opts.breakDelayMs ?? BREAK_DELAY_MS);

    if (this.scanRadius < 0) throw new Error(`Scan radius must be >= 0, got ${this.scanRadius}`);

    this.fsm = new StateMachine<ObstacleInteractionController, InteractionStateId>({
      [InteractionStateId.Idle]:     new IdleState(),
      [InteractionStateId.Moving]:   new MovingState(),
      [InteractionStateId.Breaking]: new BreakingState(),
    }, InteractionStateId.Idle);
  }

  state(): InteractionStateId {
    return this.fsm.id();
  }

  /** Root of the obstacle the agent is walking to, if any. */
  pendingTarget(): GridCoordinate | null {
    return this.pendingBreak ? { ...this.pendingBreak.hit.root } : null;
  }

  /** Root of the break being walked to or waited on. */
  breakTarget(): GridCoordinate | null {
    if (this.pendingBreak) return { ...this.pendingBreak.hit.root };
    const awaited = this.awaitedBreakId === null ? null : this.scheduler.find(this.awaitedBreakId);
    return awaited ? { ...awaited.hit.root } : null;
  }

  scheduledBreakCount(): number {
    return this.scheduler.size;
  }

  /** Walk to `target`. A failed search leaves the current route and state untouched. */
  requestMove(target: GridCoordinate): MoveOutcome {
    const route = this.routeTo(target);
    if (!route) {
      this.log(`move to ${cellKey(target)} dropped: no path`);
      return 'no-path';
    }

    this.supersede();
    if (this.policy === 'cancel') this.pendingBreak = null;
    this.startRoute(route, `move to ${cellKey(target)}`);
    return 'accepted';
  }

  /** Walk next to the obstacle covering `target`, then break it. */
  requestBreak(target: GridCoordinate): BreakOutcome {
    const hit = locateObstacleRoot(target, this.navigation.obstacleLayers, this.scanRadius);
    if (!hit) {
      this.log(`break at ${cellKey(target)} dropped: no obstacle`);
      return 'no-obstacle';
    }

    const from = this.agent.currentCell();
    const adjacent = nearestWalkableAdjacent(this.navigation.current, hit.root, from);
    if (!adjacent) {
      this.log(`break at ${cellKey(hit.root)} dropped: no walkable cell next to it`);
      return 'unreachable';
    }

    const route = this.pathFinder.findPath(this.navigation.current, from, adjacent);
    if (!route) {
      this.log(`break at ${cellKey(hit.root)} dropped: no path to ${cellKey(adjacent)}`);
      return 'no-path';
    }

    this.supersede();
    this.pendingBreak = { id: this.nextBreakId++, hit, epoch: this.epoch };
    this.startRoute(route, `break ${hit.layer.kind.name} at ${cellKey(hit.root)} via ${cellKey(adjacent)}`);
    return 'accepted';
  }

  /** Drive timers and the state machine by one tick. */
  advance(dtMs: number): void {
    for (const due of this.scheduler.update(dtMs)) {
      this.executeBreak(due);
    }
    this.fsm.update(this, dtMs);
  }

  // --- helpers exposed for states

  setState(next: InteractionStateId, why: string): void {
    if (this.fsm.id() === next) return;
    this.log(`${this.fsm.id()} -> ${next} (${why})`);
    this.fsm.set(next, this);
  }

  /** Moves the pending break onto the timer. False if none was pending. */
  schedulePendingBreak(): boolean {
    const pending = this.pendingBreak;
    if (!pending) return false;
    this.pendingBreak = null;
    this.scheduler.schedule(pending);
    this.awaitedBreakId = pending.id;
    return true;
  }

  isAwaitingBreak(): boolean {
    return this.awaitedBreakId !== null && this.scheduler.isScheduled(this.awaitedBreakId);
  }

  // --- internals

  private routeTo(target: GridCoordinate): Route | null {
    return this.pathFinder.findPath(this.navigation.current, this.agent.currentCell(), target);
  }

  private supersede(): void {
    this.epoch++;
    this.awaitedBreakId = null;
    if (this.policy === 'cancel') {
      const dropped = this.scheduler.cancelStale(this.epoch);
      if (dropped > 0) this.log(`cancelled ${dropped} scheduled break(s)`);
    }
  }

  private startRoute(route: Route, why: string): void {
    this.mover.follow(route);
    this.fsm.set(InteractionStateId.Moving, this);
    this.log(`moving (${why}), ${route.length} step(s)`);
  }

  private executeBreak(pending: PendingBreak): void {
    const { hit } = pending;
    if (this.policy === 'cancel' && pending.epoch !== this.epoch) {
      this.log(`break at ${cellKey(hit.root)} skipped: superseded`);
      return;
    }
    if (!blocksAt(hit.layer, hit.root)) {
      this.log(`break at ${cellKey(hit.root)} skipped: obstacle already gone`);
      return;
    }

    this.clearObstacle(hit);
    this.navigation.regenerate();
    this.log(`broke ${hit.layer.kind.name} at ${cellKey(hit.root)}, grid rebuilt`);
  }

  private clearObstacle(hit: ObstacleHit): void {
    const [root, ...decoration] = obstacleFootprint(hit);
    hit.layer.tiles.clearTile(root);
    for (const c of decoration) {
      // A neighbouring obstacle's root may sit where this one's decoration would.
      if (hit.layer.tiles.hasTile(c) && !blocksAt(hit.layer, c)) hit.layer.tiles.clearTile(c);
    }
  }

  private log(msg: string): void {
    if (!this.logEnabled) return;
    // eslint-disable-next-line no-console
    console.log(`[interaction] ${msg}`);
  }
}
