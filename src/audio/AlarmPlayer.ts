import { spawn } from 'node:child_process';
import { writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { AlarmPreset } from '../shared/types';
import { synthesizeTone } from './ToneSynth';

export type RunCommand = (command: string, args: string[]) => Promise<void>;
export type WriteFile = (file: string, data: Buffer) => Promise<void>;

export interface AlarmPlayerOptions {
  muted?: boolean;
  volume?: number; // 0..100
  platform?: NodeJS.Platform;
  output?: { write(chunk: string): unknown };
  run?: RunCommand;
  writeFile?: WriteFile;
  tmpDir?: string;
  /** Sound file played instead of the synthesized preset */
  file?: string;
}

const runCommand: RunCommand = (command, args) => new Promise((resolve, reject) => {
  const child = spawn(command, args, { stdio: 'ignore' });
  child.once('error', reject);
  child.once('exit', code => {
    if (code === 0) resolve();
    else reject(new Error(`${command} exited with code ${code}`));
  });
});

export function playerCommand(platform: NodeJS.Platform, file: string): [string, string[]] | null {
  switch (platform) {
    case 'darwin': return ['afplay', [file]];
    case 'linux': return ['aplay', ['-q', file]];
    case 'win32': {
      const quoted = file.replace(/'/g, "''");
      return ['powershell', ['-NoProfile', '-Command', `(New-Object Media.SoundPlayer '${quoted}').PlaySync()`]];
    }
    default: return null;
  }
}

/**
 * Plays an alarm through the platform's command-line player: the user's sound
 * file when one is configured, a synthesized preset otherwise.
 * Playback problems are logged and replaced by the terminal bell; `play` never rejects.
 */
export class AlarmPlayer {
  private _muted: boolean;
  private _volume: number;
  private readonly _platform: NodeJS.Platform;
  private readonly _output: { write(chunk: string): unknown };
  private readonly _run: RunCommand;
  private readonly _writeFile: WriteFile;
  private readonly _tmpDir: string;
  private readonly _file: string | null;

  constructor(options: AlarmPlayerOptions = {}) {
    this._muted = options.muted ?? false;
    this._volume = options.volume ?? 50;
    this._platform = options.platform ?? process.platform;
    this._output = options.output ?? process.stdout;
    this._run = options.run ?? runCommand;
    this._writeFile = options.writeFile ?? writeFile;
    this._tmpDir = options.tmpDir ?? tmpdir();
    this._file = options.file ?? null;
  }

  get muted(): boolean { return this._muted; }

  setMuted(muted: boolean): void {
    this._muted = muted;
  }

  setVolume(v: number): void {
    this._volume = Math.max(0, Math.min(100, v));
  }

  getVolume(): number { return this._volume; }

  async play(preset: AlarmPreset, isBreak = false): Promise<void> {
    if (this._muted) return;

    const file = this._file
      ?? path.join(this._tmpDir, `pomodoro-alarm-${preset}${isBreak ? '-break' : ''}.wav`);
    const command = playerCommand(this._platform, file);
    if (!command) {
      this._bell();
      return;
    }

    try {
      if (!this._file) {
        await this._writeFile(file, synthesizeTone(preset, { volume: this._volume, soft: isBreak }));
      }
      await this._run(command[0], command[1]);
    } catch (err) {
      console.warn('Alarm playback failed, using terminal bell:', err instanceof Error ? err.message : err);
      this._bell();
    }
  }

  private _bell(): void {
    this._output.write('\x07');
  }
}
