/**
 * Unbounded FIFO message queue with a single consumer.
 *
 * Node runs JavaScript on one thread: producers (keyboard stream, file
 * watcher, timers) append from event-loop callbacks and can never run in
 * the middle of a `drain`. `drain` hands over the whole current contents
 * at once, so anything pushed afterwards waits for the next drain.
 */

import type { Message } from './message.js';

export class MessageQueue {
  private items: Message[] = [];

  get size(): number {
    return this.items.length;
  }

  get empty(): boolean {
    return this.items.length === 0;
  }

  push(message: Message): void {
    this.items.push(message);
  }

  /** Take everything queued so far, oldest first, and empty the queue. */
  drain(): Message[] {
    const taken = this.items;
    this.items = [];
    return taken;
  }

  /** Put `messages` back at the front of the queue, in order. */
  requeue(messages: readonly Message[]): void {
    this.items = [...messages, ...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
