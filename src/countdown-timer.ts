import { ConfigurationError, ErrorCode } from './errors.js';

export type CountdownState = 'idle' | 'running' | 'paused';

/**
 * A pausable deadline shared by every blocking wait of one conversion.
 *
 * Elapsed time is read from the clock when asked for; nothing ticks in the
 * background. `stop()` folds the running segment into `elapsed` so a
 * paused timer keeps its remaining budget until `start()` is called again.
 */
export class CountdownTimer {
  readonly budgetMs: number;
  private readonly now: () => number;
  private elapsedMs = 0;
  private segmentStart = 0;
  private _state: CountdownState = 'idle';

  constructor(budgetMs: number, now: () => number = Date.now) {
    if (!Number.isFinite(budgetMs) || budgetMs < 1) {
      throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `Conversion timeout has to be 1 millisecond or more, got ${budgetMs}`);
    }
    this.budgetMs = budgetMs;
    this.now = now;
  }

  get state(): CountdownState {
    return this._state;
  }

  /** Starts counting, or resumes after `stop()`. No-op while running. */
  start(): void {
    if (this._state === 'running') return;
    this.segmentStart = this.now();
    this._state = 'running';
  }

  /** Pauses counting, keeping the time used so far. No-op unless running. */
  stop(): void {
    if (this._state !== 'running') return;
    this.elapsedMs += Math.max(0, this.now() - this.segmentStart);
    this._state = 'paused';
  }

  get elapsed(): number {
    if (this._state !== 'running') return this.elapsedMs;
    return this.elapsedMs + Math.max(0, this.now() - this.segmentStart);
  }

  /** Budget left in milliseconds, never negative. */
  get remaining(): number {
    return Math.max(0, this.budgetMs - this.elapsed);
  }

  get expired(): boolean {
    return this.remaining === 0;
  }

  /** The wait bound for an operation: its own timeout capped by what is left. */
  bound(operationTimeoutMs?: number): number {
    return Math.min(operationTimeoutMs ?? Number.POSITIVE_INFINITY, this.remaining);
  }
}

/** `min(timeout, countdown.remaining)` for callers that may not have a countdown. */
export function waitBound(timeoutMs: number | undefined, countdown: CountdownTimer | undefined): number {
  if (countdown) return countdown.bound(timeoutMs);
  return timeoutMs ?? Number.POSITIVE_INFINITY;
}
