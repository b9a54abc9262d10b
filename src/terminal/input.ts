/**
 * Terminal input sources: keypresses and resizes become queued messages.
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import { Message, type KeyPressMessage } from '../core/message.js';
import type { Runtime } from '../core/runtime.js';

export interface KeyboardInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  readonly readableFlowing?: boolean | null;
}

export interface ResizeSource {
  columns?: number;
  rows?: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

/**
 * Turn a readline keypress into a key_press message.
 * Returns null when the event carries neither a name nor a sequence.
 */
export function decodeKey(sequence: string | undefined, key: Key | undefined): KeyPressMessage | null {
  const name = key?.name ?? sequence;
  if (name === undefined || name.length === 0) return null;

  const printable = sequence !== undefined && isPrintable(sequence);
  return Message.keyPress({
    key: name,
    value: printable ? sequence : name,
    ctrl: key?.ctrl ?? false,
    alt: key?.meta ?? false,
    shift: key?.shift ?? false,
  });
}

function isPrintable(sequence: string): boolean {
  if ([...sequence].length !== 1) return false;
  const code = sequence.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Feed keypresses from `input` into the runtime. Ctrl+C enqueues `exit`.
 * Returns a function that detaches the listener and restores the terminal.
 */
export function attachKeyboard(runtime: Runtime, input: KeyboardInput = process.stdin): () => void {
  const wasFlowing = input.readableFlowing === true;
  emitKeypressEvents(input);
  const wasRaw = input.isRaw ?? false;
  if (input.isTTY) input.setRawMode?.(true);

  const onKeypress = (sequence: string | undefined, key: Key | undefined): void => {
    const message = decodeKey(sequence, key);
    if (!message) return;
    runtime.enqueue(message.ctrl && message.key === 'c' ? Message.exit() : message);
  };

  input.on('keypress', onKeypress);

  return () => {
    input.removeListener('keypress', onKeypress);
    if (input.isTTY) input.setRawMode?.(wasRaw);
    // Keypress decoding left the stream flowing.
    if (!wasFlowing) input.pause();
  };
}

/** Enqueue a resize message whenever the output terminal changes size. */
export function attachResize(runtime: Runtime, output: ResizeSource = process.stdout): () => void {
  const onResize = (): void => {
    if (typeof output.columns === 'number' && typeof output.rows === 'number') {
      runtime.enqueue(Message.resize(output.columns, output.rows));
    }
  };

  output.on('resize', onResize);
  return () => {
    output.off('resize', onResize);
  };
}
