/**
 * Runtime: drains the message queue through the root model.
 *
 * A driver enqueues input, calls `tick(model)` on a fixed period, keeps the
 * model it gets back, and renders it when `shouldRender()` is true.
 *
 * Each tick processes exactly the messages queued when it started. Commands
 * run as soon as `update` returns; a batch command re-enqueues its messages
 * for the following tick. Errors thrown by `update` propagate, and the rest
 * of that tick's messages stay queued.
 */

import type { Command, Message } from './message.js';
import type { Model, UpdateResult } from './model.js';
import { MessageQueue } from './queue.js';

export interface RuntimeOptions {
  queue?: MessageQueue;
}

/** Where an enqueued message came from. */
export type MessageSource = 'external' | 'command';

export interface RuntimeObserver {
  /** A message was appended to the queue. */
  enqueued?(message: Message, source: MessageSource): void;
  /** A tick took these messages off the queue and is about to process them. */
  drained?(messages: readonly Message[], tick: number): void;
}

export class Runtime {
  private readonly queue: MessageQueue;
  private running = false;
  private renderDue = false;
  private ticks = 0;
  private observers: RuntimeObserver[] = [];

  constructor(options: RuntimeOptions = {}) {
    this.queue = options.queue ?? new MessageQueue();
  }

  /** Append a message for the next tick. */
  enqueue(message: Message): void {
    this.push(message, 'external');
  }

  /** Number of messages waiting for the next tick. */
  get pending(): number {
    return this.queue.size;
  }

  /**
   * Fold every queued message through `model.update`, executing each
   * returned command, and return the resulting model. When `update` throws,
   * the messages after the failing one go back to the front of the queue.
   */
  tick(model: Model): Model {
    const messages = this.queue.drain();
    let current = model;
    let renderDue = false;

    if (messages.length > 0) {
      this.ticks++;
      for (const observer of this.observers) observer.drained?.(messages, this.ticks);
    }

    for (const [index, message] of messages.entries()) {
      let result: UpdateResult;
      try {
        result = current.update(message);
      } catch (error) {
        this.queue.requeue(messages.slice(index + 1));
        throw error;
      }

      const [next, command] = result;
      current = next;
      this.execute(command);

      if (message.kind !== 'none') renderDue = true;
    }

    this.renderDue = renderDue;
    return current;
  }

  /** Whether the last tick processed anything other than `none`. */
  shouldRender(): boolean {
    return this.renderDue;
  }

  isRunning(): boolean {
    return this.running;
  }

  isStopped(): boolean {
    return !this.running;
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  /** Number of ticks that processed at least one message. */
  get tickCount(): number {
    return this.ticks;
  }

  /** Register an observer. Returns a function that removes it. */
  observe(observer: RuntimeObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter((o) => o !== observer);
    };
  }

  private push(message: Message, source: MessageSource): void {
    this.queue.push(message);
    for (const observer of this.observers) observer.enqueued?.(message, source);
  }

  private execute(command: Command): void {
    switch (command.kind) {
      case 'none':
        break;
      case 'exit':
        this.stop();
        break;
      case 'batch':
        for (const message of command.messages) this.push(message, 'command');
        break;
      case 'reload':
      case 'resize':
        // Informational; handled by application update logic.
        break;
    }
  }
}
