import type { AlarmPreset } from '../shared/types';

type Waveform = 'sine' | 'square';

interface Note {
  freq: number;
  start: number; // seconds
  duration: number; // seconds
  wave: Waveform;
  gain: number;
  decay?: boolean;
}

export interface ToneOptions {
  volume?: number; // 0..100
  sampleRate?: number;
  /** Break tones: an octave up at half volume */
  soft?: boolean;
}

const RAMP_S = 0.01;

function classic(): Note[] {
  // Two-tone square beep, three times
  const beepDur = 0.15;
  const gap = 0.1;
  const notes: Note[] = [];
  for (let i = 0; i < 3; i++) {
    const offset = i * (beepDur * 2 + gap * 2);
    notes.push({ freq: 880, start: offset, duration: beepDur, wave: 'square', gain: 0.6 });
    notes.push({ freq: 660, start: offset + beepDur + gap, duration: beepDur, wave: 'square', gain: 0.6 });
  }
  return notes;
}

function chime(): Note[] {
  // C5, E5, G5 with bell-like decay
  return [523.25, 659.25, 783.99].map((freq, i) => ({
    freq, start: i * 0.15, duration: 1.2, wave: 'sine' as const, gain: 0.4, decay: true,
  }));
}

function arcade(): Note[] {
  // 8-bit ascending arpeggio C4, E4, G4, C5
  const noteLen = 0.12;
  const steps = [261.63, 329.63, 392.0, 523.25];
  const notes: Note[] = [];
  for (let r = 0; r < 2; r++) {
    const base = r * (steps.length * noteLen + 0.1);
    steps.forEach((freq, i) => {
      notes.push({ freq, start: base + i * noteLen, duration: noteLen, wave: 'square', gain: 0.5 });
    });
  }
  return notes;
}

const PRESETS: Record<AlarmPreset, () => Note[]> = {
  beep: () => [{ freq: 880, start: 0, duration: 0.5, wave: 'sine', gain: 1 }],
  classic,
  chime,
  arcade,
};

function sampleNote(note: Note, t: number): number {
  const local = t - note.start;
  if (local < 0 || local >= note.duration) return 0;

  const phase = 2 * Math.PI * note.freq * local;
  const raw = note.wave === 'sine' ? Math.sin(phase) : Math.sign(Math.sin(phase));

  let env = 1;
  if (local < RAMP_S) env = local / RAMP_S;
  else if (note.duration - local < RAMP_S) env = (note.duration - local) / RAMP_S;
  if (note.decay) env *= Math.exp((-4 * local) / note.duration);

  return raw * env * note.gain;
}

/** Wrap mono 16-bit PCM samples in a RIFF/WAVE container */
export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const dataSize = samples.length * 2;
  const buf = Buffer.alloc(44 + dataSize);

  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataSize, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16); // fmt chunk size
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(1, 22); // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28); // byte rate
  buf.writeUInt16LE(2, 32); // block align
  buf.writeUInt16LE(16, 34); // bits per sample
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataSize, 40);

  samples.forEach((s, i) => buf.writeInt16LE(s, 44 + i * 2));
  return buf;
}

/** Length of a preset in seconds */
export function toneDuration(preset: AlarmPreset): number {
  return Math.max(...PRESETS[preset]().map(n => n.start + n.duration));
}

export function synthesizeTone(preset: AlarmPreset, options: ToneOptions = {}): Buffer {
  const { volume = 50, sampleRate = 44100, soft = false } = options;
  const pitchMult = soft ? 2 : 1;
  const volMult = soft ? 0.5 : 1;
  const level = (Math.max(0, Math.min(100, volume)) / 100) * volMult;

  const notes = PRESETS[preset]().map(n => ({ ...n, freq: n.freq * pitchMult }));
  const count = Math.round(toneDuration(preset) * sampleRate);
  const samples = new Int16Array(count);

  for (let i = 0; i < count; i++) {
    const t = i / sampleRate;
    const mix = notes.reduce((sum, n) => sum + sampleNote(n, t), 0);
    samples[i] = Math.round(32767 * level * Math.max(-1, Math.min(1, mix)));
  }

  return encodeWav(samples, sampleRate);
}
