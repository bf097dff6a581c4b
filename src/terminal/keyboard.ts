import { emitKeypressEvents, type Key } from 'node:readline';

export interface KeyHandlers {
  onToggle: () => void;
  onReset: () => void;
  onQuit: () => void;
  onCheckTask: () => void;
  onMute: () => void;
  onVolume: (delta: number) => void;
}

const VOLUME_STEP = 10;

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Space toggles, r resets, d checks off a task, m mutes, + and - change the
 * volume, q or Ctrl+C quits. Returns an unbind function.
 */
export function bindKeyboard(input: KeyInput, handlers: KeyHandlers): () => void {
  emitKeypressEvents(input);
  if (input.isTTY) input.setRawMode?.(true);
  input.resume();

  const onKeypress = (str: string | undefined, key: Key | undefined): void => {
    if (!key) return;
    if ((key.ctrl && key.name === 'c') || key.name === 'q') {
      handlers.onQuit();
    } else if (key.name === 'space') {
      handlers.onToggle();
    } else if (key.name === 'r') {
      handlers.onReset();
    } else if (key.name === 'd') {
      handlers.onCheckTask();
    } else if (key.name === 'm') {
      handlers.onMute();
    } else if (str === '+' || str === '=') {
      // '=' shares the key with '+' on most layouts
      handlers.onVolume(VOLUME_STEP);
    } else if (str === '-') {
      handlers.onVolume(-VOLUME_STEP);
    }
  };
  input.on('keypress', onKeypress);

  return () => {
    input.removeListener('keypress', onKeypress);
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
  };
}
