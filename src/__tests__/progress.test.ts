import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { findProgressError, formatProgressEvent, readProgress } from '../docker/progress.js';
import type { ProgressEvent } from '../types/registry.js';

describe('readProgress', () => {
  it('should decode JSON lines split across chunks', async () => {
    const stream = Readable.from([
      '{"status":"Pulling fs layer","id":"a1"}\n{"sta',
      'tus":"Download complete","id":"a1"}\n',
      Buffer.from('{"status":"Digest: sha256:abc"}'),
    ]);
    const seen: ProgressEvent[] = [];

    const events = await readProgress(stream, event => seen.push(event));

    expect(events).toEqual([
      { status: 'Pulling fs layer', id: 'a1' },
      { status: 'Download complete', id: 'a1' },
      { status: 'Digest: sha256:abc' },
    ]);
    expect(seen).toEqual(events);
  });

  it('should decode a character split across buffers', async () => {
    const stream = Readable.from([
      Buffer.from([0x7b, 0x22, 0x73, 0x74, 0x61, 0x74, 0x75, 0x73, 0x22, 0x3a, 0x22, 0x63, 0x61, 0x66, 0xc3]),
      Buffer.from([0xa9, 0x22, 0x7d, 0x0a]),
    ]);

    const events = await readProgress(stream);

    expect(events).toEqual([{ status: 'café' }]);
  });

  it('should keep non-JSON lines as plain status', async () => {
    const events = await readProgress(Readable.from(['plain text line\n\n']));

    expect(events).toEqual([{ status: 'plain text line' }]);
  });

  it('should keep error details', async () => {
    const events = await readProgress(
      Readable.from(['{"errorDetail":{"message":"unauthorized"},"error":"unauthorized"}\n'])
    );

    expect(events).toEqual([{ error: 'unauthorized', errorDetail: { message: 'unauthorized' } }]);
  });
});

describe('findProgressError', () => {
  it('should return the first error message', () => {
    expect(findProgressError([{ status: 'ok' }, { error: 'denied' }, { error: 'later' }])).toBe('denied');
  });

  it('should fall back to errorDetail', () => {
    expect(findProgressError([{ errorDetail: { message: 'denied' } }])).toBe('denied');
  });

  it('should return undefined when nothing failed', () => {
    expect(findProgressError([{ status: 'Pushed' }])).toBeUndefined();
  });
});

describe('formatProgressEvent', () => {
  it('should join id, status and progress', () => {
    expect(formatProgressEvent({ id: 'a1', status: 'Pushing', progress: '[==>  ] 1MB/4MB' })).toBe(
      'a1 Pushing [==>  ] 1MB/4MB'
    );
  });
});
