import type { ObstacleHit } from './ObstacleLocator';

export interface PendingBreak {
  readonly id: number;
  readonly hit: ObstacleHit;
  /** Interaction epoch the break was requested under. */
  readonly epoch: number;
}

interface ScheduledBreak {
  pending: PendingBreak;
  elapsedMs: number;
}

/** Elapsed-time timers for breaks waiting out their delay. */
export class BreakScheduler {
  private scheduled: ScheduledBreak[] = [];

  constructor(private readonly delayMs: number) {
    if (delayMs < 0) throw new Error(`Break delay must be >= 0, got ${delayMs}`);
  }

  schedule(pending: PendingBreak): void {
    this.scheduled.push({ pending, elapsedMs: 0 });
  }

  /** Advance every timer; returns the breaks that came due, oldest first. */
  update(dtMs: number): PendingBreak[] {
    const due: PendingBreak[] = [];
    const waiting: ScheduledBreak[] = [];
    for (const entry of this.scheduled) {
      entry.elapsedMs += dtMs;
      if (entry.elapsedMs >= this.delayMs) due.push(entry.pending);
      else waiting.push(entry);
    }
    this.scheduled = waiting;
    return due;
  }

  isScheduled(id: number): boolean {
    return this.find(id) !== null;
  }

  find(id: number): PendingBreak | null {
    return this.scheduled.find((e) => e.pending.id === id)?.pending ?? null;
  }

  /** Drop every timer not requested under `epoch`. Returns how many were dropped. */
  cancelStale(epoch: number): number {
    const before = this.scheduled.length;
    this.scheduled = this.scheduled.filter((e) => e.pending.epoch === epoch);
    return before - this.scheduled.length;
  }

  get size(): number {
    return this.scheduled.length;
  }
}
