import type { CompletionEvent, Interval, SessionSnapshot, TaskItem, TickResult } from '../shared/types';
import { formatClock, progressBar } from './format';

export interface Output {
  write(chunk: string): unknown;
}

const CLEAR_LINE = '\r\x1b[2K';

/** Single-line countdown redrawn in place with carriage returns */
export class CountdownView {
  private _lineOpen = false;

  constructor(private _out: Output) {}

  print(line = ''): void {
    this._closeLine();
    this._out.write(`${line}\n`);
  }

  showInterval(interval: Interval, index: number, total: number): void {
    this.print();
    this.print(`▶ ${interval.label} (${index + 1}/${total}) — ${Math.floor(interval.durationSeconds / 60)} minute(s)`);
  }

  render(result: TickResult): void {
    if (result.type === 'complete') {
      this.showComplete(result.event);
      return;
    }
    this._redraw(`${result.interval.label}: ${formatClock(result.remainingSeconds)} ${progressBar(result.percent)} ${result.percent}%`);
  }

  renderSnapshot(snap: SessionSnapshot): void {
    if (!snap.interval) {
      this._redraw('✓ All intervals complete');
      return;
    }
    const clock = formatClock(snap.remainingSeconds);
    switch (snap.status) {
      case 'running':
        this._redraw(`${snap.interval.label}: ${clock} ${progressBar(snap.percent)} ${snap.percent}%`);
        break;
      case 'paused':
        this._redraw(`⏸ ${snap.interval.label}: ${clock} paused (space to resume)`);
        break;
      default:
        this._redraw(`${snap.interval.label}: ${clock} ready (space to start)`);
    }
  }

  showComplete(event: CompletionEvent): void {
    this._redraw(`✓ ${event.interval.label} complete`);
    this._closeLine();
  }

  showTasks(tasks: TaskItem[]): void {
    if (tasks.length === 0) return;
    this.print('Tasks:');
    tasks.forEach(t => this.print(`  [${t.done ? 'x' : ' '}] ${t.text}`));
  }

  private _redraw(line: string): void {
    this._out.write(`${CLEAR_LINE}${line}`);
    this._lineOpen = true;
  }

  private _closeLine(): void {
    if (!this._lineOpen) return;
    this._out.write('\n');
    this._lineOpen = false;
  }
}
