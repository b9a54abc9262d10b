/**
 * Counter app: the simplest interactive demo.
 *
 * Exercises: keyboard input, state transitions through `with`, mapped child
 * state, batch commands and exit.
 *
 * Keys: + / k / up increment, - / j / down decrement, b bumps by two on the
 * next tick, r resets, q or escape quits.
 */

import { fileURLToPath } from 'node:url';
import { defineApplication } from '../app/application.js';
import { reloadExport } from '../app/loader.js';
import { Text } from '../components/text.js';
import { Container } from '../core/container.js';
import { Message, type KeyPressMessage } from '../core/message.js';
import { child, type UpdateResult } from '../core/model.js';
import { readNumber, type StateInput } from '../core/state.js';

export const COUNTER_HELP = '+/- change, b bump, r reset, q quit';

export class Counter extends Container {
  static children = [
    child(Text, () => ({ content: 'Counter' })),
    child(Text, (state) => ({ content: `Count: ${readNumber(state, 'count')}` })),
    child(Text, () => ({ content: COUNTER_HELP })),
  ];

  get count(): number {
    return readNumber(this.state, 'count');
  }

  update(message: Message): UpdateResult {
    switch (message.kind) {
      case 'key_press':
        return this.handleKey(message);
      case 'resize':
        return [this.with({ width: message.width, height: message.height }), Message.none()];
      default:
        return [this, Message.none()];
    }
  }

  protected defaultState(): StateInput {
    return { count: 0 };
  }

  private handleKey(message: KeyPressMessage): UpdateResult {
    switch (message.key) {
      case '+':
      case 'k':
      case 'up':
        return [this.with({ count: this.count + 1 }), Message.none()];
      case '-':
      case 'j':
      case 'down':
        return [this.with({ count: this.count - 1 }), Message.none()];
      case 'b':
        return [this, Message.batch([Message.keyPress({ key: '+' }), Message.keyPress({ key: '+' })])];
      case 'r':
        return [this.with({ count: 0 }), Message.none()];
      case 'q':
      case 'escape':
        return [this, Message.exit()];
      default:
        return [this, Message.none()];
    }
  }
}

export const counterApp = defineApplication({
  name: 'counter',
  description: 'Increment and decrement a number. Tests key handling, batch commands and exit.',
  root: Counter,
  config: { appDir: fileURLToPath(new URL('.', import.meta.url)) },
  reloadRoot: reloadExport(import.meta.url, 'Counter'),
});
