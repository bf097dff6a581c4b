import type { Interval, IntervalKind } from '../shared/types';

/** Immutable, ordered sequence of intervals. Iteration order is execution order. */
export class Plan implements Iterable<Interval> {
  private readonly _intervals: readonly Interval[];

  constructor(intervals: readonly Interval[]) {
    this._intervals = Object.freeze(intervals.map(i => Object.freeze({ ...i })));
  }

  get intervals(): readonly Interval[] { return this._intervals; }
  get length(): number { return this._intervals.length; }

  get totalSeconds(): number {
    return this._intervals.reduce((sum, i) => sum + i.durationSeconds, 0);
  }

  at(index: number): Interval | null {
    if (index < 0 || index >= this._intervals.length) return null;
    return this._intervals[index];
  }

  count(kind: IntervalKind): number {
    return this._intervals.filter(i => i.kind === kind).length;
  }

  [Symbol.iterator](): Iterator<Interval> {
    return this._intervals[Symbol.iterator]();
  }
}
