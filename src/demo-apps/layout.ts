/**
 * Layout app: weighted containers and a dynamic child.
 *
 * The body is chosen by the `body` method each time the root is built, so
 * toggling the split swaps a column of panes for a row of them. Both use
 * weights 1:2:1; the header and status bar take one share each against
 * the body's three.
 *
 * Keys: space or t toggles the split, q quits.
 */

import { fileURLToPath } from 'node:url';
import { defineApplication } from '../app/application.js';
import { reloadExport } from '../app/loader.js';
import { Text } from '../components/text.js';
import { Container } from '../core/container.js';
import type { Direction } from '../core/layout.js';
import { Message } from '../core/message.js';
import { child, type ModelClass, type UpdateResult } from '../core/model.js';
import { readString, type StateInput } from '../core/state.js';

const panes = [
  child(Text, () => ({ content: 'Left' }), 1),
  child(Text, () => ({ content: 'Center' }), 2),
  child(Text, () => ({ content: 'Right' }), 1),
];

export class RowBody extends Container {
  static direction: Direction = 'row';
  static children = panes;
}

export class ColumnBody extends Container {
  static direction: Direction = 'column';
  static children = panes;
}

export class LayoutDemo extends Container {
  static children = [
    child(Text, (state) => ({ content: `Layout: ${readString(state, 'split', 'column')}` }), 1),
    child('body', undefined, 3),
    child(Text, () => ({ content: 'space: toggle, q: quit' }), 1),
  ];

  get split(): Direction {
    return readString(this.state, 'split') === 'row' ? 'row' : 'column';
  }

  body(): ModelClass {
    return this.split === 'row' ? RowBody : ColumnBody;
  }

  update(message: Message): UpdateResult {
    switch (message.kind) {
      case 'key_press':
        if (message.key === 'q') return [this, Message.exit()];
        if (message.key === 'space' || message.key === 't') {
          return [this.with({ split: this.split === 'row' ? 'column' : 'row' }), Message.none()];
        }
        return [this, Message.none()];
      case 'resize':
        return [this.with({ width: message.width, height: message.height }), Message.none()];
      default:
        return [this, Message.none()];
    }
  }

  protected defaultState(): StateInput {
    return { split: 'column' };
  }
}

export const layoutApp = defineApplication({
  name: 'layout',
  description: 'Nested row and column containers. Tests weighted layout and dynamic children.',
  root: LayoutDemo,
  config: { appDir: fileURLToPath(new URL('.', import.meta.url)) },
  reloadRoot: reloadExport(import.meta.url, 'LayoutDemo'),
});
