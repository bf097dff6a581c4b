import { describe, it, expect } from 'vitest';
import type { PlanConfig } from '../../shared/types';
import { DEFAULT_PLAN_CONFIG, InvalidConfigurationError, buildPlan } from '../planBuilder';

describe('buildPlan', () => {
  describe('defaults', () => {
    it('builds 4 focus sessions with a long break after the 4th', () => {
      const plan = buildPlan();
      expect(plan.intervals.map(i => i.label)).toEqual([
        'Focus 1', 'Short break 1',
        'Focus 2', 'Short break 2',
        'Focus 3', 'Short break 3',
        'Focus 4', 'Long break',
      ]);
    });

    it('uses 25/5/15 minute durations', () => {
      const plan = buildPlan();
      expect(plan.at(0)?.durationSeconds).toBe(25 * 60);
      expect(plan.at(1)?.durationSeconds).toBe(5 * 60);
      expect(plan.at(7)?.durationSeconds).toBe(15 * 60);
    });

    it('exposes the documented default configuration', () => {
      expect(DEFAULT_PLAN_CONFIG).toEqual({
        pomodoros: 4,
        focusMinutes: 25,
        shortBreakMinutes: 5,
        longBreakMinutes: 15,
        longBreakEvery: 4,
        repeatCycles: 1,
        longBreakPlacement: 'cadence',
      });
    });
  });

  describe('final long break placement', () => {
    it('puts a single long break after the last focus session', () => {
      const plan = buildPlan({
        pomodoros: 2, focusMinutes: 1, shortBreakMinutes: 1, longBreakMinutes: 2,
        longBreakPlacement: 'final',
      });
      expect(plan.intervals.map(i => i.label)).toEqual(['Focus 1', 'Short break 1', 'Focus 2', 'Long break']);
      expect(plan.at(plan.length - 1)?.durationSeconds).toBe(120);
    });

    it('ignores the cadence', () => {
      const plan = buildPlan({ pomodoros: 3, longBreakEvery: 1, longBreakPlacement: 'final' });
      expect(plan.intervals.map(i => i.kind)).toEqual([
        'focus', 'shortBreak', 'focus', 'shortBreak', 'focus', 'longBreak',
      ]);
    });
  });

  describe('cadence placement', () => {
    it('places a long break after every Nth focus session', () => {
      const plan = buildPlan({ pomodoros: 4, longBreakEvery: 2 });
      expect(plan.intervals.map(i => i.kind)).toEqual([
        'focus', 'shortBreak', 'focus', 'longBreak',
        'focus', 'shortBreak', 'focus', 'longBreak',
      ]);
    });

    it('ends on a short break when pomodoros is not a multiple of the cadence', () => {
      const plan = buildPlan({ pomodoros: 3, longBreakEvery: 2 });
      expect(plan.intervals.map(i => i.label)).toEqual([
        'Focus 1', 'Short break 1', 'Focus 2', 'Long break', 'Focus 3', 'Short break 3',
      ]);
    });

    it('matches the final placement when the cadence equals the pomodoro count', () => {
      const cadence = buildPlan({ pomodoros: 3, longBreakEvery: 3 });
      const final = buildPlan({ pomodoros: 3, longBreakPlacement: 'final' });
      expect(cadence.intervals).toEqual(final.intervals);
    });
  });

  describe('repeat cycles', () => {
    it('restarts numbering in every cycle', () => {
      const plan = buildPlan({ pomodoros: 2, longBreakEvery: 2, repeatCycles: 2 });
      expect(plan.intervals.map(i => i.label)).toEqual([
        'Focus 1', 'Short break 1', 'Focus 2', 'Long break',
        'Focus 1', 'Short break 1', 'Focus 2', 'Long break',
      ]);
    });

    it('has repeatCycles * 2 * pomodoros intervals', () => {
      const configs = [
        { pomodoros: 1, repeatCycles: 1 },
        { pomodoros: 3, repeatCycles: 2 },
        { pomodoros: 5, repeatCycles: 3, longBreakEvery: 2 },
        { pomodoros: 4, repeatCycles: 2, longBreakPlacement: 'final' as const },
      ];
      for (const config of configs) {
        expect(buildPlan(config).length).toBe(config.repeatCycles * 2 * config.pomodoros);
      }
    });
  });

  describe('totalSeconds', () => {
    it('sums one focus and the long break for a single pomodoro', () => {
      const plan = buildPlan({
        pomodoros: 1, focusMinutes: 2, shortBreakMinutes: 1, longBreakMinutes: 3,
        longBreakPlacement: 'final',
      });
      expect(plan.totalSeconds).toBe(2 * 60 + 3 * 60);
    });

    it('equals focus time plus each break kind times its length', () => {
      const config = {
        pomodoros: 5, focusMinutes: 20, shortBreakMinutes: 4, longBreakMinutes: 10,
        longBreakEvery: 2, repeatCycles: 2,
      };
      const plan = buildPlan(config);
      // per cycle: breaks after 2 and 4 are long, 1, 3 and 5 short
      expect(plan.count('longBreak')).toBe(4);
      expect(plan.count('shortBreak')).toBe(6);
      expect(plan.totalSeconds).toBe(
        2 * 5 * 20 * 60 + 4 * 10 * 60 + 6 * 4 * 60,
      );
    });
  });

  describe('plan value', () => {
    it('iterates the same sequence every time', () => {
      const plan = buildPlan({ pomodoros: 2 });
      expect([...plan]).toEqual([...plan]);
      expect([...plan]).toEqual(plan.intervals);
    });

    it('freezes intervals', () => {
      const plan = buildPlan();
      expect(Object.isFrozen(plan.intervals)).toBe(true);
      expect(Object.isFrozen(plan.at(0))).toBe(true);
    });

    it('returns null outside the plan', () => {
      const plan = buildPlan({ pomodoros: 1 });
      expect(plan.at(2)).toBeNull();
      expect(plan.at(-1)).toBeNull();
    });

    it('is deterministic', () => {
      expect(buildPlan({ pomodoros: 3 }).intervals).toEqual(buildPlan({ pomodoros: 3 }).intervals);
    });
  });

  describe('validation', () => {
    it('rejects zero pomodoros', () => {
      expect(() => buildPlan({ pomodoros: 0 })).toThrow(InvalidConfigurationError);
    });

    it('rejects a non-positive focus length', () => {
      expect(() => buildPlan({ focusMinutes: 0 })).toThrow(InvalidConfigurationError);
    });

    const cases: Array<[keyof PlanConfig, Partial<PlanConfig>]> = [
      ['pomodoros', { pomodoros: -1 }],
      ['focusMinutes', { focusMinutes: 0 }],
      ['shortBreakMinutes', { shortBreakMinutes: -5 }],
      ['longBreakMinutes', { longBreakMinutes: 0 }],
      ['longBreakEvery', { longBreakEvery: 0 }],
      ['repeatCycles', { repeatCycles: 0 }],
      ['focusMinutes', { focusMinutes: 2.5 }],
      ['pomodoros', { pomodoros: Number.NaN }],
    ];

    it.each(cases)('reports %s as the failing field', (field, overrides) => {
      try {
        buildPlan(overrides);
        expect.unreachable('buildPlan should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidConfigurationError);
        if (err instanceof InvalidConfigurationError) expect(err.field).toBe(field);
      }
    });

    it('reports the first failing field in declaration order', () => {
      expect(() => buildPlan({ repeatCycles: 0, pomodoros: 0 }))
        .toThrow('pomodoros must be a positive integer (got 0)');
    });
  });
});
