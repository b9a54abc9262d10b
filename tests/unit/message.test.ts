/**
 * Unit tests for messages and commands.
 */

import { describe, it, expect } from 'vitest';
import { describeMessage, isCommand, Message, messagesEqual } from '../../src/core/message.js';

describe('Message factories', () => {
  it('returns shared instances for tag-only messages', () => {
    expect(Message.none()).toBe(Message.none());
    expect(Message.exit()).toEqual({ kind: 'exit' });
    expect(Message.reload()).toEqual({ kind: 'reload' });
  });

  it('fills key press defaults', () => {
    expect(Message.keyPress({ key: 'a' })).toEqual({
      kind: 'key_press',
      key: 'a',
      value: 'a',
      ctrl: false,
      alt: false,
      shift: false,
    });
  });

  it('keeps an explicit key value and modifiers', () => {
    const message = Message.keyPress({ key: 'space', value: ' ', ctrl: true });
    expect(message.value).toBe(' ');
    expect(message.ctrl).toBe(true);
    expect(message.shift).toBe(false);
  });

  it('copies and freezes batch contents', () => {
    const inner = [Message.custom('a')];
    const batch = Message.batch(inner);
    inner.push(Message.custom('b'));
    expect(batch.messages).toHaveLength(1);
    expect(Object.isFrozen(batch.messages)).toBe(true);
    expect(Object.isFrozen(batch)).toBe(true);
  });

  it('defaults to an empty batch', () => {
    expect(Message.batch().messages).toEqual([]);
  });

  it('omits an absent custom payload', () => {
    expect(Message.custom('ping')).toEqual({ kind: 'custom', type: 'ping' });
    expect(Message.custom('ping', { n: 1 })).toEqual({ kind: 'custom', type: 'ping', payload: { n: 1 } });
  });

  it('uses the given tick timestamp', () => {
    expect(Message.tick(1234).timestamp).toBe(1234);
  });
});

describe('messagesEqual', () => {
  it('treats same tag and payload as equal', () => {
    expect(messagesEqual(Message.keyPress({ key: 'q' }), Message.keyPress({ key: 'q' }))).toBe(true);
    expect(messagesEqual(Message.resize(80, 24), Message.resize(80, 24))).toBe(true);
  });

  it('distinguishes payloads and tags', () => {
    expect(messagesEqual(Message.keyPress({ key: 'q' }), Message.keyPress({ key: 'q', ctrl: true }))).toBe(false);
    expect(messagesEqual(Message.none(), Message.exit())).toBe(false);
    expect(messagesEqual(Message.resize(80, 24), Message.resize(24, 80))).toBe(false);
  });

  it('compares batches element by element', () => {
    const a = Message.batch([Message.tick(1), Message.custom('x', [1, 2])]);
    const b = Message.batch([Message.tick(1), Message.custom('x', [1, 2])]);
    const c = Message.batch([Message.tick(1), Message.custom('x', [1, 3])]);
    expect(messagesEqual(a, b)).toBe(true);
    expect(messagesEqual(a, c)).toBe(false);
  });
});

describe('isCommand', () => {
  it('accepts the command kinds only', () => {
    expect(isCommand(Message.none())).toBe(true);
    expect(isCommand(Message.exit())).toBe(true);
    expect(isCommand(Message.batch())).toBe(true);
    expect(isCommand(Message.reload())).toBe(true);
    expect(isCommand(Message.resize(1, 1))).toBe(true);
    expect(isCommand(Message.tick(0))).toBe(false);
    expect(isCommand(Message.keyPress({ key: 'a' }))).toBe(false);
    expect(isCommand(Message.custom('a'))).toBe(false);
  });
});

describe('describeMessage', () => {
  it('summarizes each kind', () => {
    expect(describeMessage(Message.keyPress({ key: 'c', ctrl: true }))).toBe('key_press(ctrl+c)');
    expect(describeMessage(Message.keyPress({ key: 'q' }))).toBe('key_press(q)');
    expect(describeMessage(Message.batch([Message.none(), Message.exit()]))).toBe('batch[2]');
    expect(describeMessage(Message.resize(80, 24))).toBe('resize(80x24)');
    expect(describeMessage(Message.tick(5))).toBe('tick(5)');
    expect(describeMessage(Message.custom('save'))).toBe('custom(save)');
    expect(describeMessage(Message.reload())).toBe('reload');
  });
});
