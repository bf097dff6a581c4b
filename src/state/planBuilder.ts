import type { Interval, PlanConfig } from '../shared/types';
import { Plan } from './Plan';

export const DEFAULT_PLAN_CONFIG: Readonly<PlanConfig> = Object.freeze({
  pomodoros: 4,
  focusMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  longBreakEvery: 4,
  repeatCycles: 1,
  longBreakPlacement: 'cadence',
});

const POSITIVE_FIELDS = [
  'pomodoros',
  'focusMinutes',
  'shortBreakMinutes',
  'longBreakMinutes',
  'longBreakEvery',
  'repeatCycles',
] as const;

export class InvalidConfigurationError extends Error {
  constructor(
    readonly field: keyof PlanConfig,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

function validate(config: PlanConfig): void {
  for (const field of POSITIVE_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidConfigurationError(field, `${field} must be a positive integer (got ${value})`);
    }
  }
  if (config.longBreakPlacement !== 'cadence' && config.longBreakPlacement !== 'final') {
    throw new InvalidConfigurationError(
      'longBreakPlacement',
      `longBreakPlacement must be "cadence" or "final" (got ${String(config.longBreakPlacement)})`,
    );
  }
}

/**
 * Build the full interval sequence for a session.
 *
 * Every focus interval is followed by exactly one break, so the plan holds
 * `repeatCycles * 2 * pomodoros` intervals. Focus and short-break numbering
 * restarts at 1 in each repeat cycle.
 *
 * With `cadence` placement a long break follows every `longBreakEvery`-th focus
 * interval; with `final` placement a single long break closes each cycle.
 */
export function buildPlan(overrides: Partial<PlanConfig> = {}): Plan {
  const config: PlanConfig = { ...DEFAULT_PLAN_CONFIG, ...overrides };
  validate(config);

  const intervals: Interval[] = [];
  for (let cycle = 0; cycle < config.repeatCycles; cycle++) {
    for (let index = 1; index <= config.pomodoros; index++) {
      intervals.push({
        kind: 'focus',
        label: `Focus ${index}`,
        durationSeconds: config.focusMinutes * 60,
      });

      const longBreak = config.longBreakPlacement === 'final'
        ? index === config.pomodoros
        : index % config.longBreakEvery === 0;

      intervals.push(longBreak
        ? { kind: 'longBreak', label: 'Long break', durationSeconds: config.longBreakMinutes * 60 }
        : { kind: 'shortBreak', label: `Short break ${index}`, durationSeconds: config.shortBreakMinutes * 60 });
    }
  }

  return new Plan(intervals);
}
