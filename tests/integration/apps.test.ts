/**
 * Integration tests: demo apps driven through the Runtime, plus a
 * record → encode → decode → replay round trip.
 */

import { describe, it, expect } from 'vitest';
import { isModelClass, type Model } from '../../src/core/model.js';
import { Message } from '../../src/core/message.js';
import { Runtime } from '../../src/core/runtime.js';
import { readBoolean, readNumber, readString } from '../../src/core/state.js';
import { ALL_APPS, APP_NAMES, ColumnBody, Counter, COUNTER_HELP, LayoutDemo, RowBody, Ticker } from '../../src/demo-apps/index.js';
import {
  createRecorder,
  decodeRecording,
  encodeRecording,
  replayRecording,
} from '../../src/replay/recording.js';
import { stripAnsi } from '../../src/terminal/ansi.js';
import { boundsOf } from '../helpers/models.js';

function press(runtime: Runtime, ...keys: string[]): void {
  for (const key of keys) runtime.enqueue(Message.keyPress({ key }));
}

describe('demo registry', () => {
  it('lists every app in a stable order', () => {
    expect(APP_NAMES).toEqual(['counter', 'layout', 'ticker']);
    for (const name of APP_NAMES) {
      expect(ALL_APPS[name].name).toBe(name);
      expect(isModelClass(ALL_APPS[name].root)).toBe(true);
    }
  });
});

describe('counter app', () => {
  it('counts key presses and renders the count', () => {
    const runtime = new Runtime();
    press(runtime, '+', '+', 'k', '-');

    const model = runtime.tick(new Counter({ width: 40, height: 6 }));

    expect(readNumber(model.state, 'count')).toBe(2);
    expect(model.view()).toBe(`\x1b[1;1HCounter\x1b[3;1HCount: 2\x1b[5;1H${COUNTER_HELP}`);
  });

  it('bumps by two on the following tick', () => {
    const runtime = new Runtime();
    press(runtime, 'b');

    const first = runtime.tick(new Counter({ width: 40, height: 6 }));
    expect(readNumber(first.state, 'count')).toBe(0);

    const second = runtime.tick(first);
    expect(readNumber(second.state, 'count')).toBe(2);
  });

  it('resets and quits', () => {
    const runtime = new Runtime();
    runtime.start();
    press(runtime, '+', 'r');
    const reset = runtime.tick(new Counter({ width: 40, height: 6 }));
    expect(readNumber(reset.state, 'count')).toBe(0);
    expect(runtime.isRunning()).toBe(true);

    press(runtime, 'q');
    runtime.tick(reset);
    expect(runtime.isRunning()).toBe(false);
  });

  it('rebuilds its layout on resize', () => {
    const runtime = new Runtime();
    runtime.enqueue(Message.resize(60, 9));

    const model = runtime.tick(new Counter({ width: 40, height: 6 }));

    expect(boundsOf(model)).toEqual({ width: 60, height: 9, x: 0, y: 0 });
    expect(boundsOf(model.children[2])).toEqual({ width: 60, height: 3, x: 0, y: 6 });
  });

  it('renders on every non-none tick even when the count does not change', () => {
    const runtime = new Runtime();
    press(runtime, 'x');
    runtime.tick(new Counter({ width: 40, height: 6 }));
    expect(runtime.shouldRender()).toBe(true);
  });
});

describe('layout app', () => {
  function body(model: Model): Model {
    return model.children[1];
  }

  it('splits the screen 1:3:1 with a column body', () => {
    const model = new LayoutDemo({ width: 40, height: 10 });

    expect(model.children.map((c) => boundsOf(c).height)).toEqual([2, 6, 2]);
    expect(body(model)).toBeInstanceOf(ColumnBody);
    expect(body(model).children.map((c) => boundsOf(c))).toEqual([
      { width: 40, height: 1, x: 0, y: 2 },
      { width: 40, height: 3, x: 0, y: 3 },
      { width: 40, height: 1, x: 0, y: 6 },
    ]);
  });

  it('swaps the body for a row when toggled', () => {
    const runtime = new Runtime();
    press(runtime, 'space');

    const model = runtime.tick(new LayoutDemo({ width: 40, height: 10 }));

    expect(readString(model.state, 'split')).toBe('row');
    expect(body(model)).toBeInstanceOf(RowBody);
    expect(body(model).children.map((c) => boundsOf(c))).toEqual([
      { width: 10, height: 6, x: 0, y: 2 },
      { width: 20, height: 6, x: 10, y: 2 },
      { width: 10, height: 6, x: 30, y: 2 },
    ]);
    expect(stripAnsi(model.children[0].view())).toBe('Layout: row');
  });

  it('toggles back to a column', () => {
    const runtime = new Runtime();
    press(runtime, 't', 't');
    const model = runtime.tick(new LayoutDemo({ width: 40, height: 10 }));
    expect(body(model)).toBeInstanceOf(ColumnBody);
  });

  it('renders every pane', () => {
    const view = stripAnsi(new LayoutDemo({ width: 40, height: 10 }).view());
    expect(view).toBe('Layout: columnLeftCenterRightspace: toggle, q: quit');
  });
});

describe('ticker app', () => {
  it('counts ticks and keeps the last timestamp', () => {
    const runtime = new Runtime();
    runtime.enqueue(Message.tick(1000));
    runtime.enqueue(Message.tick(2000));

    const model = runtime.tick(new Ticker({ width: 40, height: 3 }));

    expect(readNumber(model.state, 'ticks')).toBe(2);
    expect(readNumber(model.state, 'lastTick')).toBe(2000);
    expect(stripAnsi(model.children[0].view())).toBe('Ticks: 2');
    expect(stripAnsi(model.children[1].view())).toBe('Last tick: 1970-01-01T00:00:02.000Z');
  });

  it('ignores ticks while paused', () => {
    const runtime = new Runtime();
    press(runtime, 'p');
    runtime.enqueue(Message.tick(1000));

    const model = runtime.tick(new Ticker({ width: 40, height: 3 }));

    expect(readBoolean(model.state, 'paused')).toBe(true);
    expect(readNumber(model.state, 'ticks')).toBe(0);
    expect(stripAnsi(model.children[0].view())).toBe('Ticks: 0 (paused)');
  });
});

describe('record and replay', () => {
  it('replays an encoded counter session to the same state', () => {
    const runtime = new Runtime();
    runtime.start();
    const recorder = createRecorder(runtime);

    let model: Model = new Counter({ width: 40, height: 6 });
    press(runtime, '+', 'b');
    model = runtime.tick(model);
    model = runtime.tick(model);
    press(runtime, '-', 'q');
    model = runtime.tick(model);
    recorder.stop();

    const recording = decodeRecording(encodeRecording(recorder.recording()));
    const replay = replayRecording(new Counter({ width: 40, height: 6 }), recording);

    expect(readNumber(model.state, 'count')).toBe(2);
    expect(replay.model.equals(model)).toBe(true);
    expect(replay.stopped).toBe(true);
    expect(replay.renders).toEqual([true, true, true]);
  });
});
