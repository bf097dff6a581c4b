import type { AlarmPreset, AutoStartPolicy, CompletionEvent } from '../shared/types';
import type { HistoryStore } from '../state/HistoryStore';
import { type SessionController, shouldAutoStart } from '../state/SessionController';
import type { TaskList } from '../state/TaskList';
import type { CountdownView } from './CountdownView';

export type RunOutcome = 'finished' | 'stopped';

export interface AlarmSink {
  readonly muted: boolean;
  play(preset: AlarmPreset, isBreak: boolean): Promise<void>;
  setMuted(muted: boolean): void;
  getVolume(): number;
  setVolume(volume: number): void;
}

export interface SessionRunnerOptions {
  policy: AutoStartPolicy;
  autoCheckTasks: boolean;
  checkToBottom: boolean;
  alarm: AlarmPreset;
  tickMs?: number;
  /** Start the first interval as soon as `run` is called */
  startImmediately?: boolean;
}

export interface SessionRunnerDeps {
  controller: SessionController;
  view: CountdownView;
  history: HistoryStore;
  tasks: TaskList;
  alarm: AlarmSink;
  clock?: () => number;
}

/**
 * Owns the one timer of a session: ticks the controller at a fixed cadence
 * and turns completion events into side effects.
 */
export class SessionRunner {
  private readonly _controller: SessionController;
  private readonly _view: CountdownView;
  private readonly _history: HistoryStore;
  private readonly _tasks: TaskList;
  private readonly _alarm: AlarmSink;
  private readonly _clock: () => number;
  private _timer: ReturnType<typeof setInterval> | null = null;
  private _resolve: ((outcome: RunOutcome) => void) | null = null;
  private _done: Promise<RunOutcome> | null = null;

  constructor(deps: SessionRunnerDeps, private _options: SessionRunnerOptions) {
    this._controller = deps.controller;
    this._view = deps.view;
    this._history = deps.history;
    this._tasks = deps.tasks;
    this._alarm = deps.alarm;
    this._clock = deps.clock ?? (() => performance.now());
  }

  get running(): boolean { return this._timer !== null; }

  run(): Promise<RunOutcome> {
    if (this._done) return this._done;

    this._done = new Promise<RunOutcome>(resolve => {
      this._resolve = resolve;
    });

    const first = this._controller.currentInterval;
    if (!first) {
      this._finish('finished');
      return this._done;
    }

    this._showCurrent();
    if (this._options.startImmediately ?? true) {
      this._controller.start(this._clock());
    }
    this._view.renderSnapshot(this._controller.snapshot(this._clock()));
    this._timer = setInterval(() => this._step(), this._options.tickMs ?? 250);
    return this._done;
  }

  toggle(): void {
    const now = this._clock();
    if (this._controller.status === 'running') {
      this._controller.pause(now);
    } else {
      this._controller.start(now);
    }
    this._view.renderSnapshot(this._controller.snapshot(now));
  }

  reset(): void {
    this._controller.reset();
    this._view.print();
    this._view.print('↺ Session reset');
    this._showCurrent();
    this._redraw();
  }

  stop(): void {
    this._finish('stopped');
  }

  /** Check off the next open task by hand */
  checkTask(): void {
    const checked = this._tasks.autoCheckNext(this._options.checkToBottom);
    this._view.print(checked ? `  ✓ Task done: ${checked.text}` : '  No open tasks');
    this._redraw();
  }

  toggleMute(): void {
    this._alarm.setMuted(!this._alarm.muted);
    this._view.print(this._alarm.muted ? '  Alarm muted' : '  Alarm on');
    this._redraw();
  }

  changeVolume(delta: number): void {
    this._alarm.setVolume(this._alarm.getVolume() + delta);
    this._view.print(`  Volume: ${this._alarm.getVolume()}`);
    this._redraw();
  }

  private _step(): void {
    const now = this._clock();
    const result = this._controller.tick(now);
    if (!result) return;

    this._view.render(result);
    if (result.type === 'complete') this._onComplete(result.event, now);
  }

  private _onComplete(event: CompletionEvent, now: number): void {
    const { interval, next } = event;

    this._history.log({
      label: interval.label,
      kind: interval.kind,
      durationSeconds: interval.durationSeconds,
      completedAt: new Date().toISOString(),
    });

    if (this._options.autoCheckTasks && interval.kind === 'focus') {
      const checked = this._tasks.autoCheckNext(this._options.checkToBottom);
      if (checked) this._view.print(`  ✓ Task done: ${checked.text}`);
    }

    this._alarm.play(this._options.alarm, interval.kind !== 'focus').catch(err => {
      console.warn('Alarm failed:', err instanceof Error ? err.message : err);
    });

    if (!next) {
      this._finish('finished');
      return;
    }

    this._showCurrent();
    if (shouldAutoStart(this._options.policy, next)) {
      this._controller.start(now);
    }
    this._view.renderSnapshot(this._controller.snapshot(now));
  }

  private _redraw(): void {
    if (this.running) this._view.renderSnapshot(this._controller.snapshot(this._clock()));
  }

  private _showCurrent(): void {
    const interval = this._controller.currentInterval;
    if (interval) {
      this._view.showInterval(interval, this._controller.currentIndex, this._controller.plan.length);
    }
  }

  private _finish(outcome: RunOutcome): void {
    if (this._timer !== null) {
      clearInterval(this._timer);
      this._timer = null;
    }
    this._view.print();
    const resolve = this._resolve;
    this._resolve = null;
    resolve?.(outcome);
  }
}
