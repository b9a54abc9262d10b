/**
 * Program: the driver loop.
 *
 * Starts the runtime, renders the initial frame, then on every frame
 * interval ticks the runtime and renders when it asks for it. `run()`
 * settles once the runtime stops; the screen is restored either way.
 */

import { Message } from '../core/message.js';
import type { Model } from '../core/model.js';
import { Runtime } from '../core/runtime.js';
import { Renderer } from '../terminal/renderer.js';
import { attachKeyboard, attachResize, type KeyboardInput, type ResizeSource } from '../terminal/input.js';
import { DEFAULT_CONFIG } from './config.js';
import { silentLogger, type Logger } from './logger.js';

export interface ProgramOptions {
  runtime?: Runtime;
  renderer?: Renderer;
  logger?: Logger;
  fps?: number;
  /** Enqueue a tick message every `tickMs` milliseconds. 0 disables. */
  tickMs?: number;
  /** Keyboard source, or false to read no keys. Defaults to stdin. */
  keyboard?: KeyboardInput | false;
  /** Resize source, or false to ignore resizes. Defaults to stdout. */
  resize?: ResizeSource | false;
}

export class Program {
  private current: Model;
  private readonly runtime: Runtime;
  private readonly renderer: Renderer;
  private readonly logger: Logger;
  private readonly frameMs: number;
  private readonly tickMs: number;
  private readonly keyboard: KeyboardInput | false;
  private readonly resize: ResizeSource | false;

  constructor(model: Model, options: ProgramOptions = {}) {
    this.current = model;
    this.runtime = options.runtime ?? new Runtime();
    this.renderer = options.renderer ?? new Renderer();
    this.logger = options.logger ?? silentLogger;
    this.frameMs = 1000 / (options.fps ?? DEFAULT_CONFIG.fps);
    this.tickMs = options.tickMs ?? 0;
    this.keyboard = options.keyboard ?? process.stdin;
    this.resize = options.resize ?? process.stdout;
  }

  /** The model as of the last processed frame. */
  get model(): Model {
    return this.current;
  }

  isRunning(): boolean {
    return this.runtime.isRunning();
  }

  stop(): void {
    this.runtime.stop();
  }

  /** Swap in a new root model, e.g. after a hot reload. */
  replaceModel(model: Model): void {
    this.current = model;
  }

  /** Process one frame: tick the runtime and render if needed. */
  step(): void {
    this.current = this.runtime.tick(this.current);
    if (this.runtime.shouldRender()) this.renderer.render(this.current);
  }

  run(): Promise<void> {
    this.runtime.start();
    this.renderer.setupScreen();
    this.renderer.render(this.current);
    this.logger.debug(`program started at ${Math.round(1000 / this.frameMs)} fps`);

    const detachers: Array<() => void> = [];
    if (this.keyboard) detachers.push(attachKeyboard(this.runtime, this.keyboard));
    if (this.resize) detachers.push(attachResize(this.runtime, this.resize));

    return new Promise<void>((resolve, reject) => {
      let frameTimer: NodeJS.Timeout | undefined;
      let tickTimer: NodeJS.Timeout | undefined;

      const finish = (error?: unknown): void => {
        clearInterval(frameTimer);
        clearInterval(tickTimer);
        for (const detach of detachers) detach();
        this.runtime.stop();
        this.renderer.restoreScreen();
        this.logger.debug('program stopped');
        if (error === undefined) resolve();
        else reject(error);
      };

      const frame = (): boolean => {
        try {
          this.step();
        } catch (error) {
          this.logger.error('update failed', error);
          finish(error);
          return false;
        }
        if (!this.runtime.isRunning()) {
          finish();
          return false;
        }
        return true;
      };

      if (!frame()) return;

      frameTimer = setInterval(frame, this.frameMs);
      if (this.tickMs > 0) {
        tickTimer = setInterval(() => this.runtime.enqueue(Message.tick()), this.tickMs);
      }
    });
  }
}
