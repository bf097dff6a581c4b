import { z } from 'zod';
import type { PlanConfig } from './types';

export const ALARM_PRESETS = ['beep', 'classic', 'chime', 'arcade'] as const;

// Positivity of the plan numbers is checked by buildPlan so its error names the field
const planInt = (fallback: number) => z.coerce.number().int().default(fallback);

export const AppConfigSchema = z.object({
  pomodoros: planInt(4),
  focusMinutes: planInt(25),
  shortBreakMinutes: planInt(5),
  longBreakMinutes: planInt(15),
  longBreakEvery: planInt(4),
  repeatCycles: planInt(1),
  longBreakPlacement: z.enum(['cadence', 'final']).default('cadence'),
  fast: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  autoStartBreaks: z.boolean().default(true),
  autoStartFocus: z.boolean().default(false),
  autoCheckTasks: z.boolean().default(true),
  checkToBottom: z.boolean().default(true),
  sound: z.boolean().default(true),
  alarm: z.enum(ALARM_PRESETS).default('beep'),
  volume: z.coerce.number().int().min(0).max(100).default(50),
  alarmFile: z.string().min(1).optional(),
  tasks: z.array(z.string()).default([]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid options:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

export function toPlanConfig(config: AppConfig): PlanConfig {
  return {
    pomodoros: config.pomodoros,
    focusMinutes: config.focusMinutes,
    shortBreakMinutes: config.shortBreakMinutes,
    longBreakMinutes: config.longBreakMinutes,
    longBreakEvery: config.longBreakEvery,
    repeatCycles: config.repeatCycles,
    longBreakPlacement: config.longBreakPlacement,
  };
}

/** Fast mode plays one plan minute per real second */
export function timeScaleFor(config: Pick<AppConfig, 'fast'>): number {
  return config.fast ? 60 : 1;
}
