/**
 * Renderer: writes a model's view to the terminal.
 *
 * Every frame is a full redraw: clear, home, then the view string. Each
 * frame goes out in a single write.
 */

import type { Model } from '../core/model.js';
import { CLEAR_SCREEN, HIDE_CURSOR, SHOW_CURSOR, moveTo } from './ansi.js';

export type RenderOutput = Pick<NodeJS.WritableStream, 'write'>;

export class Renderer {
  private frames = 0;

  constructor(private readonly output: RenderOutput = process.stdout) {}

  /** Frames written since construction. */
  get frameCount(): number {
    return this.frames;
  }

  setupScreen(): void {
    this.output.write(HIDE_CURSOR + CLEAR_SCREEN + moveTo(0, 0));
  }

  render(model: Model): void {
    const content = model.view();
    this.output.write(CLEAR_SCREEN + moveTo(0, 0) + content);
    this.frames++;
  }

  restoreScreen(): void {
    this.output.write(CLEAR_SCREEN + SHOW_CURSOR);
  }
}
