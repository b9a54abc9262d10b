/**
 * Messages and commands.
 *
 * Messages are the input events a component's `update` consumes. Commands
 * are the side effects `update` hands back to the Runtime. Both are plain
 * frozen objects tagged by `kind`, so two values with the same tag and
 * payload compare equal under `messagesEqual`.
 */

// ── Message variants ───────────────────────────────────────────────

export interface NoneMessage {
  readonly kind: 'none';
}

export interface ExitMessage {
  readonly kind: 'exit';
}

export interface ReloadMessage {
  readonly kind: 'reload';
}

export interface TickMessage {
  readonly kind: 'tick';
  /** Epoch milliseconds at which the tick was produced. */
  readonly timestamp: number;
}

export interface KeyPressMessage {
  readonly kind: 'key_press';
  /** Key name (`'q'`, `'up'`, `'return'`, ...). */
  readonly key: string;
  /** Printable value of the key, or the key name when it has none. */
  readonly value: string;
  readonly ctrl: boolean;
  readonly alt: boolean;
  readonly shift: boolean;
}

export interface BatchMessage {
  readonly kind: 'batch';
  readonly messages: readonly Message[];
}

export interface ResizeMessage {
  readonly kind: 'resize';
  readonly width: number;
  readonly height: number;
}

/** Application-defined message. */
export interface CustomMessage {
  readonly kind: 'custom';
  readonly type: string;
  readonly payload?: unknown;
}

export type Message =
  | NoneMessage
  | ExitMessage
  | ReloadMessage
  | TickMessage
  | KeyPressMessage
  | BatchMessage
  | ResizeMessage
  | CustomMessage;

export type MessageKind = Message['kind'];

/** Side effects the Runtime knows how to execute. */
export type Command = NoneMessage | ExitMessage | BatchMessage | ReloadMessage | ResizeMessage;

const COMMAND_KINDS: ReadonlySet<MessageKind> = new Set(['none', 'exit', 'batch', 'reload', 'resize']);

export function isCommand(message: Message): message is Command {
  return COMMAND_KINDS.has(message.kind);
}

// ── Factories ──────────────────────────────────────────────────────

const NONE = Object.freeze<NoneMessage>({ kind: 'none' });
const EXIT = Object.freeze<ExitMessage>({ kind: 'exit' });
const RELOAD = Object.freeze<ReloadMessage>({ kind: 'reload' });

export interface KeyPressInit {
  key: string;
  value?: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
}

/** Message constructors. */
export const Message = {
  none(): NoneMessage {
    return NONE;
  },

  exit(): ExitMessage {
    return EXIT;
  },

  reload(): ReloadMessage {
    return RELOAD;
  },

  tick(timestamp: number = Date.now()): TickMessage {
    const message: TickMessage = { kind: 'tick', timestamp };
    return Object.freeze(message);
  },

  keyPress(init: KeyPressInit): KeyPressMessage {
    const message: KeyPressMessage = {
      kind: 'key_press',
      key: init.key,
      value: init.value ?? init.key,
      ctrl: init.ctrl ?? false,
      alt: init.alt ?? false,
      shift: init.shift ?? false,
    };
    return Object.freeze(message);
  },

  batch(messages: readonly Message[] = []): BatchMessage {
    const message: BatchMessage = { kind: 'batch', messages: Object.freeze([...messages]) };
    return Object.freeze(message);
  },

  resize(width: number, height: number): ResizeMessage {
    const message: ResizeMessage = { kind: 'resize', width, height };
    return Object.freeze(message);
  },

  custom(type: string, payload?: unknown): CustomMessage {
    const message: CustomMessage = payload === undefined ? { kind: 'custom', type } : { kind: 'custom', type, payload };
    return Object.freeze(message);
  },
} as const;

// ── Equality ───────────────────────────────────────────────────────

/** Structural equality: same tag, same payload. */
export function messagesEqual(a: Message, b: Message): boolean {
  return deepEqual(a, b);
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every(
    (key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(Reflect.get(a, key), Reflect.get(b, key)),
  );
}

/** Short human-readable form used in logs. */
export function describeMessage(message: Message): string {
  switch (message.kind) {
    case 'key_press': {
      const mods = [message.ctrl && 'ctrl', message.alt && 'alt', message.shift && 'shift'].filter(Boolean);
      return mods.length > 0 ? `key_press(${mods.join('+')}+${message.key})` : `key_press(${message.key})`;
    }
    case 'batch':
      return `batch[${message.messages.length}]`;
    case 'resize':
      return `resize(${message.width}x${message.height})`;
    case 'tick':
      return `tick(${message.timestamp})`;
    case 'custom':
      return `custom(${message.type})`;
    default:
      return message.kind;
  }
}
