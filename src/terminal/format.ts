import type { Plan } from '../state/Plan';
import type { AppConfig } from '../shared/config';

export const BANNER = String.raw`
  ___                    _
 | _ \___ _ __  ___  __| |___ _ _ ___
 |  _/ _ \ '  \/ _ \/ _' / _ \ '_/ _ \
 |_| \___/_|_|_\___/\__,_\___/_| \___/
`;

/** MM:SS; minutes are not wrapped at 60 */
export function formatClock(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

export function formatMinutes(seconds: number): string {
  return `${Math.floor(seconds / 60)} min`;
}

export function progressBar(percent: number, width = 20): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

export function describePlan(plan: Plan): string[] {
  return plan.intervals.map(i => `- ${i.label}: ${Math.floor(i.durationSeconds / 60)} minute(s)`);
}

export function formatSummary(config: AppConfig): string[] {
  const lines = [
    `Pomodoros : ${config.pomodoros}`,
    `Focus     : ${config.focusMinutes} minute(s)`,
    `Short br. : ${config.shortBreakMinutes} minute(s)`,
    `Long br.  : ${config.longBreakMinutes} minute(s)`,
  ];
  if (config.longBreakPlacement === 'cadence') {
    lines.push(`Long every: ${config.longBreakEvery} pomodoro(s)`);
  }
  if (config.repeatCycles > 1) {
    lines.push(`Cycles    : ${config.repeatCycles}`);
  }
  return lines;
}

/** Human duration for the end-of-session summary, e.g. "1h 5m" or "25m" */
export function formatDuration(seconds: number): string {
  const totalMins = Math.round(seconds / 60);
  return totalMins >= 60
    ? `${Math.floor(totalMins / 60)}h ${totalMins % 60}m`
    : `${totalMins}m`;
}
