/**
 * Docker Engine progress streams
 *
 * Pull and push answer with newline-delimited JSON objects; an `error`
 * field on any of them means the operation failed even though the HTTP
 * call itself succeeded.
 */

import { StringDecoder } from 'node:string_decoder';
import type { ProgressEvent } from '../types/registry.js';

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function toProgressEvent(value: object): ProgressEvent {
  const detail: unknown = Reflect.get(value, 'errorDetail');
  const detailMessage = typeof detail === 'object' && detail !== null
    ? stringField(detail, 'message')
    : undefined;

  return {
    status: stringField(value, 'status'),
    progress: stringField(value, 'progress'),
    id: stringField(value, 'id'),
    error: stringField(value, 'error'),
    errorDetail: detailMessage !== undefined ? { message: detailMessage } : undefined,
  };
}

function parseLine(line: string): ProgressEvent | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { status: trimmed };
  }

  return typeof parsed === 'object' && parsed !== null ? toProgressEvent(parsed) : { status: trimmed };
}

export async function readProgress(
  stream: AsyncIterable<string | Buffer>,
  onEvent?: (event: ProgressEvent) => void
): Promise<ProgressEvent[]> {
  const events: ProgressEvent[] = [];
  const decoder = new StringDecoder('utf8');
  let buffered = '';

  const emit = (line: string): void => {
    const event = parseLine(line);
    if (!event) return;
    events.push(event);
    onEvent?.(event);
  };

  for await (const chunk of stream) {
    buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    const lines = buffered.split('\n');
    buffered = lines.pop() ?? '';
    lines.forEach(emit);
  }

  emit(buffered + decoder.end());
  return events;
}

export function findProgressError(events: ProgressEvent[]): string | undefined {
  const failed = events.find(event => event.error || event.errorDetail?.message);
  return failed ? failed.error ?? failed.errorDetail?.message : undefined;
}

export function formatProgressEvent(event: ProgressEvent): string {
  return [event.id, event.status, event.progress].filter(Boolean).join(' ');
}
