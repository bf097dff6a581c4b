import { AlarmPlayer } from '../audio/AlarmPlayer';
import { type AppConfig, ConfigError, timeScaleFor, toPlanConfig } from '../shared/config';
import { HistoryStore } from '../state/HistoryStore';
import type { Plan } from '../state/Plan';
import { SessionController } from '../state/SessionController';
import { TaskList } from '../state/TaskList';
import { InvalidConfigurationError, buildPlan } from '../state/planBuilder';
import { CountdownView, type Output } from '../terminal/CountdownView';
import { type RunOutcome, SessionRunner } from '../terminal/SessionRunner';
import { BANNER, describePlan, formatDuration, formatSummary } from '../terminal/format';
import { type KeyInput, bindKeyboard } from '../terminal/keyboard';
import { USAGE, parseCli } from './cli';

export interface CliIO {
  stdout: Output;
  stdin: KeyInput;
  clock?: () => number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const view = new CountdownView(io.stdout);

  let config: AppConfig;
  let plan: Plan;
  try {
    const parsed = parseCli(argv);
    if (parsed.help) {
      view.print(USAGE);
      return EXIT_OK;
    }
    config = parsed.config;
    plan = buildPlan(toPlanConfig(config));
  } catch (err) {
    if (err instanceof ConfigError || err instanceof InvalidConfigurationError) {
      console.error(err.message);
      console.error('Run with --help for the list of options.');
      return EXIT_USAGE;
    }
    throw err;
  }

  view.print(BANNER);
  formatSummary(config).forEach(line => view.print(line));
  view.print();

  if (config.dryRun) {
    view.print('Planned intervals:');
    describePlan(plan).forEach(line => view.print(line));
    view.print(`Total: ${formatDuration(plan.totalSeconds)}`);
    return EXIT_OK;
  }

  const interactive = io.stdin.isTTY === true;
  const tasks = new TaskList(config.tasks);
  const history = new HistoryStore();
  const timeScale = timeScaleFor(config);
  const controller = new SessionController(plan, { timeScale });
  const runner = new SessionRunner(
    {
      controller,
      view,
      history,
      tasks,
      alarm: new AlarmPlayer({
        muted: !config.sound,
        volume: config.volume,
        file: config.alarmFile,
        output: io.stdout,
      }),
      clock: io.clock,
    },
    {
      policy: {
        autoStartBreaks: config.autoStartBreaks,
        // Nobody can press space without a terminal
        autoStartFocus: config.autoStartFocus || !interactive,
      },
      autoCheckTasks: config.autoCheckTasks,
      checkToBottom: config.checkToBottom,
      alarm: config.alarm,
    },
  );

  view.showTasks(tasks.getAll());
  view.print(interactive
    ? 'Space to pause/resume, r to reset, d to check off a task, m to mute, +/- for volume, q to quit.'
    : 'Press Ctrl+C to exit early. Running timers…');

  const unbind = interactive
    ? bindKeyboard(io.stdin, {
        onToggle: () => runner.toggle(),
        onReset: () => runner.reset(),
        onQuit: () => runner.stop(),
        onCheckTask: () => runner.checkTask(),
        onMute: () => runner.toggleMute(),
        onVolume: delta => runner.changeVolume(delta),
      })
    : () => {};
  const onSigint = (): void => runner.stop();
  process.once('SIGINT', onSigint);

  let outcome: RunOutcome;
  try {
    outcome = await runner.run();
  } finally {
    unbind();
    process.removeListener('SIGINT', onSigint);
  }

  view.print(outcome === 'stopped' ? 'Session interrupted. See you next time!' : 'Session complete. Nice work!');
  const focus = history.getByKind('focus');
  // History records plan durations, so fast runs report plan time
  const planTime = timeScale === 1 ? '' : ' (plan time)';
  view.print(`Focus sessions: ${focus.length}, focus time: ${formatDuration(history.focusSecondsTotal())}${planTime}`);
  view.showTasks(tasks.getAll());
  return EXIT_OK;
}
