/**
 * Text: wrapped, clipped text positioned inside its bounds.
 *
 * Each visible line is prefixed with a cursor-position escape, so the view
 * can be written to the terminal as-is regardless of what precedes it.
 */

import { Container } from '../core/container.js';
import { Message } from '../core/message.js';
import type { UpdateResult } from '../core/model.js';
import { readString, type StateInput } from '../core/state.js';
import { moveTo } from '../terminal/ansi.js';
import { wrapText } from './wrap.js';

export class Text extends Container {
  get content(): string {
    return readString(this.state, 'content');
  }

  /** Wrapped lines that fit in the bounds. */
  lines(): string[] {
    return wrapText(this.content, this.bounds.width).slice(0, Math.max(0, this.bounds.height));
  }

  view(): string {
    if (this.content.length === 0) return '';

    return this.lines()
      .map((line, index) => moveTo(this.bounds.x, this.bounds.y + index) + line)
      .join('');
  }

  update(_message: Message): UpdateResult {
    return [this, Message.none()];
  }

  protected defaultState(): StateInput {
    return { content: '' };
  }
}
