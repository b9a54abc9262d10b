/**
 * Ticker app: periodic tick messages.
 *
 * Counts tick messages and shows the timestamp of the last one. Ticks are
 * enqueued by the program every second.
 *
 * Keys: p pauses and resumes, q quits.
 */

import { fileURLToPath } from 'node:url';
import { defineApplication } from '../app/application.js';
import { reloadExport } from '../app/loader.js';
import { Text } from '../components/text.js';
import { Container } from '../core/container.js';
import { Message } from '../core/message.js';
import { child, type UpdateResult } from '../core/model.js';
import { readBoolean, readNumber, type State, type StateInput } from '../core/state.js';

function lastTickLabel(state: State): string {
  const last = readNumber(state, 'lastTick');
  return last > 0 ? `Last tick: ${new Date(last).toISOString()}` : 'Last tick: -';
}

export class Ticker extends Container {
  static children = [
    child(Text, (state) => ({
      content: `Ticks: ${readNumber(state, 'ticks')}${readBoolean(state, 'paused') ? ' (paused)' : ''}`,
    })),
    child(Text, (state) => ({ content: lastTickLabel(state) })),
    child(Text, () => ({ content: 'p: pause, q: quit' })),
  ];

  get ticks(): number {
    return readNumber(this.state, 'ticks');
  }

  get paused(): boolean {
    return readBoolean(this.state, 'paused');
  }

  update(message: Message): UpdateResult {
    switch (message.kind) {
      case 'tick':
        if (this.paused) return [this, Message.none()];
        return [this.with({ ticks: this.ticks + 1, lastTick: message.timestamp }), Message.none()];
      case 'key_press':
        if (message.key === 'q') return [this, Message.exit()];
        if (message.key === 'p') return [this.with({ paused: !this.paused }), Message.none()];
        return [this, Message.none()];
      case 'resize':
        return [this.with({ width: message.width, height: message.height }), Message.none()];
      default:
        return [this, Message.none()];
    }
  }

  protected defaultState(): StateInput {
    return { ticks: 0, lastTick: 0, paused: false };
  }
}

export const tickerApp = defineApplication({
  name: 'ticker',
  description: 'Counts periodic tick messages. Tests timer-driven input and pausing.',
  root: Ticker,
  config: { appDir: fileURLToPath(new URL('.', import.meta.url)), tickMs: 1000 },
  reloadRoot: reloadExport(import.meta.url, 'Ticker'),
});
