import { parseArgs } from 'node:util';
import { type AppConfig, ConfigError, parseConfig } from '../shared/config';

export const USAGE = `Usage: pomodoro [options]

Run a Pomodoro session in your terminal.

Plan:
  --pomodoros <n>            number of focus sessions per cycle (default 4)
  --focus-minutes <n>        minutes per focus session (default 25)
  --short-break-minutes <n>  minutes per short break (default 5)
  --long-break-minutes <n>   minutes per long break (default 15)
  --long-break-every <n>     long break after every n focus sessions (default 4)
  --final-long-break         one long break after the last focus session instead
  --repeat <n>               repeat the whole cycle n times (default 1)

Session:
  --fast                     treat one real second as one Pomodoro minute
  --dry-run                  show the schedule without running timers
  --manual-breaks            wait for space before each break
  --auto-start-focus         start focus sessions without waiting for space
  --task <text>              add a to-do item (repeatable)
  --manual-tasks             do not check off a task when a focus session ends
  --keep-order               leave checked tasks in place
  --mute                     no alarm sound
  --alarm <preset>           beep | classic | chime | arcade (default beep)
  --volume <0-100>           alarm volume (default 50)
  --alarm-file <path>        play this sound file instead of a preset
  -h, --help                 show this help

Keys: space start/pause, r reset, d check off a task, m mute,
      + / - volume, q quit.`;

export type CliResult =
  | { help: true }
  | { help: false; config: AppConfig };

export function parseCli(argv: string[]): CliResult {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }

  const { values } = parsed;
  if (values.help) return { help: true };

  return {
    help: false,
    config: parseConfig({
      pomodoros: values.pomodoros,
      focusMinutes: values['focus-minutes'],
      shortBreakMinutes: values['short-break-minutes'],
      longBreakMinutes: values['long-break-minutes'],
      longBreakEvery: values['long-break-every'],
      repeatCycles: values.repeat,
      longBreakPlacement: values['final-long-break'] ? 'final' : 'cadence',
      fast: values.fast ?? false,
      dryRun: values['dry-run'] ?? false,
      autoStartBreaks: !values['manual-breaks'],
      autoStartFocus: values['auto-start-focus'] ?? false,
      autoCheckTasks: !values['manual-tasks'],
      checkToBottom: !values['keep-order'],
      sound: !values.mute,
      alarm: values.alarm,
      volume: values.volume,
      alarmFile: values['alarm-file'],
      tasks: values.task ?? [],
    }),
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      pomodoros: { type: 'string' },
      'focus-minutes': { type: 'string' },
      'short-break-minutes': { type: 'string' },
      'long-break-minutes': { type: 'string' },
      'long-break-every': { type: 'string' },
      repeat: { type: 'string' },
      'final-long-break': { type: 'boolean' },
      fast: { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      'manual-breaks': { type: 'boolean' },
      'auto-start-focus': { type: 'boolean' },
      task: { type: 'string', multiple: true },
      'manual-tasks': { type: 'boolean' },
      'keep-order': { type: 'boolean' },
      mute: { type: 'boolean' },
      alarm: { type: 'string' },
      volume: { type: 'string' },
      'alarm-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
