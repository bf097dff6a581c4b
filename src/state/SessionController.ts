import type {
  AutoStartPolicy,
  CompletionEvent,
  Interval,
  SessionSnapshot,
  SessionState,
  TickResult,
} from '../shared/types';
import type { Plan } from './Plan';

interface SessionEvents {
  stateChange: SessionSnapshot;
  tick: TickResult;
  complete: CompletionEvent;
}

type SessionEventType = keyof SessionEvents;
type SessionListener<E extends SessionEventType> = (payload: SessionEvents[E]) => void;

export interface SessionControllerOptions {
  /** Divisor applied to true seconds; 60 turns one plan minute into one real second */
  timeScale?: number;
}

/** Seconds the countdown actually runs for an interval under the given scale */
export function effectiveSeconds(interval: Interval, timeScale = 1): number {
  return Math.max(1, Math.floor(interval.durationSeconds / timeScale));
}

/** Whether the presentation layer should start `next` right after a completion */
export function shouldAutoStart(policy: AutoStartPolicy, next: Interval | null): boolean {
  if (!next) return false;
  return next.kind === 'focus' ? policy.autoStartFocus : policy.autoStartBreaks;
}

function percentOf(totalMs: number, remainingMs: number): number {
  if (totalMs <= 0) return 0;
  const pct = Math.round((100 * (totalMs - remainingMs)) / totalMs);
  // 100 is reported only by the completion tick
  return Math.min(99, Math.max(0, pct));
}

/**
 * Countdown state machine over a plan. Time is always injected as `now` (ms on a
 * monotonic clock); the controller never reads a clock or schedules anything.
 * Calls that make no sense in the current state are no-ops.
 */
export class SessionController {
  private _state: SessionState;
  private readonly _timeScale: number;
  private _listeners: { [E in SessionEventType]: Set<SessionListener<E>> } = {
    stateChange: new Set(),
    tick: new Set(),
    complete: new Set(),
  };

  constructor(
    private readonly _plan: Plan,
    options: SessionControllerOptions = {},
  ) {
    const scale = options.timeScale ?? 1;
    this._timeScale = Number.isFinite(scale) && scale > 0 ? scale : 1;
    this._state = this._initialState();
  }

  on<E extends SessionEventType>(event: E, fn: SessionListener<E>): void {
    this._listeners[event].add(fn);
  }

  off<E extends SessionEventType>(event: E, fn: SessionListener<E>): void {
    this._listeners[event].delete(fn);
  }

  private _emit<E extends SessionEventType>(event: E, payload: SessionEvents[E]): void {
    this._listeners[event].forEach(fn => fn(payload));
  }

  get plan(): Plan { return this._plan; }
  get timeScale(): number { return this._timeScale; }
  get status(): SessionState['status'] { return this._state.status; }
  get currentIndex(): number { return this._state.currentIndex; }
  get currentInterval(): Interval | null { return this._plan.at(this._state.currentIndex); }
  get state(): SessionState { return { ...this._state }; }

  snapshot(now: number): SessionSnapshot {
    const { status, currentIndex, deadline, carriedRemainingMs } = this._state;
    const interval = this.currentInterval;
    if (!interval) {
      return { status, currentIndex, interval: null, totalSeconds: 0, remainingSeconds: 0, percent: 100 };
    }

    const totalMs = this._totalMs(interval);
    let remainingMs = totalMs;
    if (status === 'running' && deadline !== null) {
      remainingMs = Math.max(0, deadline - now);
    } else if (status === 'paused' && carriedRemainingMs !== null) {
      remainingMs = carriedRemainingMs;
    }

    return {
      status,
      currentIndex,
      interval,
      totalSeconds: totalMs / 1000,
      remainingSeconds: Math.ceil(remainingMs / 1000),
      percent: percentOf(totalMs, remainingMs),
    };
  }

  start(now: number): void {
    const interval = this.currentInterval;
    if (this._state.status === 'running' || !interval) return;

    const remaining = this._state.status === 'paused' && this._state.carriedRemainingMs !== null
      ? this._state.carriedRemainingMs
      : this._totalMs(interval);

    this._state = {
      currentIndex: this._state.currentIndex,
      status: 'running',
      deadline: now + remaining,
      carriedRemainingMs: null,
    };
    this._emit('stateChange', this.snapshot(now));
  }

  pause(now: number): void {
    if (this._state.status !== 'running' || this._state.deadline === null) return;
    this._state = {
      currentIndex: this._state.currentIndex,
      status: 'paused',
      deadline: null,
      carriedRemainingMs: Math.max(0, this._state.deadline - now),
    };
    this._emit('stateChange', this.snapshot(now));
  }

  reset(): void {
    this._state = this._initialState();
    this._emit('stateChange', this.snapshot(0));
  }

  tick(now: number): TickResult | null {
    const interval = this.currentInterval;
    const { status, deadline, currentIndex } = this._state;
    if (status !== 'running' || deadline === null || !interval) return null;

    if (now >= deadline) {
      const nextIndex = currentIndex + 1;
      const event: CompletionEvent = {
        index: currentIndex,
        interval,
        next: this._plan.at(nextIndex),
        percent: 100,
      };
      this._state = {
        currentIndex: nextIndex,
        status: nextIndex >= this._plan.length ? 'finished' : 'idle',
        deadline: null,
        carriedRemainingMs: null,
      };
      this._emit('complete', event);
      this._emit('stateChange', this.snapshot(now));
      return { type: 'complete', event };
    }

    const remainingMs = deadline - now;
    const result: TickResult = {
      type: 'progress',
      interval,
      remainingSeconds: Math.ceil(remainingMs / 1000),
      percent: percentOf(this._totalMs(interval), remainingMs),
    };
    this._emit('tick', result);
    return result;
  }

  private _totalMs(interval: Interval): number {
    return effectiveSeconds(interval, this._timeScale) * 1000;
  }

  private _initialState(): SessionState {
    return {
      currentIndex: 0,
      status: this._plan.length > 0 ? 'idle' : 'finished',
      deadline: null,
      carriedRemainingMs: null,
    };
  }
}
