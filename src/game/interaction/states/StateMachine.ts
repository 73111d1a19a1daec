// src/game/interaction/states/StateMachine.ts
export interface State<TCtx> {
  readonly id: string;
  enter?(ctx: TCtx): void;
  exit?(ctx: TCtx): void;
  update(ctx: TCtx, dtMs: number): void;
}

export class StateMachine<TCtx, SId extends string> {
  private states: Record<SId, State<TCtx>>;
  private current: State<TCtx>;
  private currentId: SId;

  constructor(states: Record<SId, State<TCtx>>, initial: SId) {
    this.states = states;
    this.currentId = initial;
    this.current = states[initial];
  }

  id(): SId { return this.currentId; }

  set(id: SId, ctx?: TCtx): void {
    if (this.current.exit && ctx) this.current.exit(ctx);
    this.currentId = id;
    this.current = this.states[id];
    if (this.current.enter && ctx) this.current.enter(ctx);
  }

  update(ctx: TCtx, dtMs: number): void {
    this.current.update(ctx, dtMs);
  }
}
