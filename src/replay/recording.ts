/**
 * Session recording and replay.
 *
 * A recorder observes a runtime and captures every externally enqueued
 * message, grouped by the tick that processed it. Messages produced by
 * batch commands are not recorded: replaying the inputs through the same
 * components regenerates them.
 *
 * Recordings serialize to CBOR:
 *
 *   { version: 1, ticks: <n>, frames: [{ tick, messages: [...] }, ...] }
 *
 * Messages are stored as their plain tagged objects and rebuilt through
 * the message factories on decode.
 */

import { encode, decode } from 'cborg';
import { Message } from '../core/message.js';
import type { Model } from '../core/model.js';
import { Runtime } from '../core/runtime.js';

export const RECORDING_VERSION = 1;

export interface RecordedFrame {
  /** Tick number relative to the start of the recording, from 1. */
  readonly tick: number;
  readonly messages: readonly Message[];
}

export interface Recording {
  readonly version: typeof RECORDING_VERSION;
  /** Ticks that processed messages while recording. */
  readonly ticks: number;
  readonly frames: readonly RecordedFrame[];
}

export interface Recorder {
  /** The recording so far. */
  recording(): Recording;
  /** Stop observing the runtime. */
  stop(): void;
}

export class RecordingFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordingFormatError';
  }
}

// ── Recording ──────────────────────────────────────────────────────

export function createRecorder(runtime: Runtime): Recorder {
  const startTick = runtime.tickCount;
  const frames: RecordedFrame[] = [];
  let pending: Message[] = [];
  let lastTick = startTick;

  const unsubscribe = runtime.observe({
    enqueued(message, source) {
      if (source === 'external') pending.push(message);
    },
    drained(_messages, tick) {
      lastTick = tick;
      if (pending.length === 0) return;
      frames.push({ tick: tick - startTick, messages: Object.freeze(pending) });
      pending = [];
    },
  });

  return {
    recording() {
      return { version: RECORDING_VERSION, ticks: lastTick - startTick, frames: [...frames] };
    },
    stop: unsubscribe,
  };
}

// ── Replay ─────────────────────────────────────────────────────────

export interface ReplayResult {
  model: Model;
  /** `shouldRender()` after each replayed tick. */
  renders: boolean[];
  /** Whether the runtime was stopped by an exit command. */
  stopped: boolean;
}

/**
 * Feed a recording through `model` on a fresh runtime. Ticks that only
 * processed deferred batch messages are replayed in between frames.
 */
export function replayRecording(model: Model, recording: Recording, runtime: Runtime = new Runtime()): ReplayResult {
  const base = runtime.tickCount;
  const renders: boolean[] = [];
  let current = model;

  const step = (): void => {
    current = runtime.tick(current);
    renders.push(runtime.shouldRender());
  };

  runtime.start();

  for (const frame of recording.frames) {
    while (runtime.tickCount - base < frame.tick - 1 && runtime.pending > 0) step();
    for (const message of frame.messages) runtime.enqueue(message);
    step();
  }
  while (runtime.tickCount - base < recording.ticks && runtime.pending > 0) step();

  return { model: current, renders, stopped: runtime.isStopped() };
}

// ── Encoding ───────────────────────────────────────────────────────

export function encodeRecording(recording: Recording): Uint8Array {
  return encode({
    version: recording.version,
    ticks: recording.ticks,
    frames: recording.frames.map((frame) => ({
      tick: frame.tick,
      messages: frame.messages.map(toWire),
    })),
  });
}

export function decodeRecording(data: Uint8Array): Recording {
  let raw: unknown;
  try {
    raw = decode(data);
  } catch (error) {
    throw new RecordingFormatError(`Invalid recording: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(raw)) throw new RecordingFormatError('Invalid recording: expected a map');
  if (raw['version'] !== RECORDING_VERSION) {
    throw new RecordingFormatError(`Unsupported recording version: ${String(raw['version'])}`);
  }

  const ticks = raw['ticks'];
  const frames = raw['frames'];
  if (!isCount(ticks)) throw new RecordingFormatError('Invalid recording: bad tick count');
  if (!Array.isArray(frames)) throw new RecordingFormatError('Invalid recording: frames must be an array');

  return {
    version: RECORDING_VERSION,
    ticks,
    frames: frames.map((frame: unknown, i) => {
      const tick = isRecord(frame) ? frame['tick'] : undefined;
      const messages = isRecord(frame) ? frame['messages'] : undefined;
      if (!isCount(tick) || !Array.isArray(messages)) {
        throw new RecordingFormatError(`Invalid recording: bad frame at index ${i}`);
      }
      return { tick, messages: messages.map(fromWire) };
    }),
  };
}

type WireMessage = Record<string, unknown>;

function toWire(message: Message): WireMessage {
  if (message.kind === 'batch') return { kind: 'batch', messages: message.messages.map(toWire) };
  return { ...message };
}

function fromWire(value: unknown): Message {
  if (!isRecord(value)) throw new RecordingFormatError('Invalid message: expected a map');

  const kind = value['kind'];
  switch (kind) {
    case 'none':
      return Message.none();
    case 'exit':
      return Message.exit();
    case 'reload':
      return Message.reload();
    case 'tick':
      return Message.tick(expectNumber(value, 'timestamp'));
    case 'key_press':
      return Message.keyPress({
        key: expectString(value, 'key'),
        value: expectString(value, 'value'),
        ctrl: value['ctrl'] === true,
        alt: value['alt'] === true,
        shift: value['shift'] === true,
      });
    case 'batch': {
      const messages = value['messages'];
      if (!Array.isArray(messages)) throw new RecordingFormatError('Invalid batch message: messages must be an array');
      return Message.batch(messages.map(fromWire));
    }
    case 'resize':
      return Message.resize(expectNumber(value, 'width'), expectNumber(value, 'height'));
    case 'custom':
      return Message.custom(expectString(value, 'type'), value['payload']);
    default:
      throw new RecordingFormatError(`Unknown message kind: ${String(kind)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function expectNumber(value: WireMessage, key: string): number {
  const field = value[key];
  if (typeof field !== 'number') throw new RecordingFormatError(`Invalid ${String(value['kind'])} message: ${key} must be a number`);
  return field;
}

function expectString(value: WireMessage, key: string): string {
  const field = value[key];
  if (typeof field !== 'string') throw new RecordingFormatError(`Invalid ${String(value['kind'])} message: ${key} must be a string`);
  return field;
}
