/**
 * In-memory streams for capturing terminal and log output.
 */

import { Writable } from 'node:stream';

export interface Capture {
  stream: Writable;
  chunks: string[];
  text(): string;
}

/** A writable that keeps every chunk as a string. */
export function captureStream(): Capture {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, chunks, text: () => chunks.join('') };
}
