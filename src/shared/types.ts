export type IntervalKind = 'focus' | 'shortBreak' | 'longBreak';

export type SessionStatus = 'idle' | 'running' | 'paused' | 'finished';

/** Where long breaks go: every N focus sessions, or once after the last one */
export type LongBreakPlacement = 'cadence' | 'final';

export type AlarmPreset = 'beep' | 'classic' | 'chime' | 'arcade';

export interface Interval {
  readonly kind: IntervalKind;
  readonly label: string;
  readonly durationSeconds: number;
}

export interface PlanConfig {
  pomodoros: number;
  focusMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  longBreakEvery: number;
  repeatCycles: number;
  longBreakPlacement: LongBreakPlacement;
}

export interface SessionState {
  currentIndex: number; // >= plan length once finished
  status: SessionStatus;
  deadline: number | null; // ms on the caller's clock, set only while running
  carriedRemainingMs: number | null; // set only while paused
}

export interface CompletionEvent {
  index: number;
  interval: Interval;
  next: Interval | null;
  percent: 100;
}

export type TickResult =
  | { type: 'complete'; event: CompletionEvent }
  | { type: 'progress'; interval: Interval; remainingSeconds: number; percent: number };

export interface SessionSnapshot {
  status: SessionStatus;
  currentIndex: number;
  interval: Interval | null;
  totalSeconds: number; // effective (scaled) length of the current interval
  remainingSeconds: number;
  percent: number; // 0..100
}

export interface AutoStartPolicy {
  autoStartBreaks: boolean;
  autoStartFocus: boolean;
}

export interface TaskItem {
  id: string;
  text: string;
  done: boolean;
}

export interface HistoryEntry {
  id: string;
  label: string;
  kind: IntervalKind;
  durationSeconds: number;
  completedAt: string; // ISO string
}
