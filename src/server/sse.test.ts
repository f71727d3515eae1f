import test from 'node:test';
import assert from 'node:assert/strict';
import type { GameEvent } from '../events/types.js';
import { formatSseComment, formatSseEvent, openSseStream, type SseTarget } from './sse.js';

class FakeResponse implements SseTarget {
  headers: Record<string, string> = {};
  chunks: string[] = [];
  ended = 0;
  flushed = false;

  setHeader(name: string, value: string) {
    this.headers[name] = value;
  }
  flushHeaders() {
    this.flushed = true;
  }
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
  end() {
    this.ended++;
  }
}

const event: GameEvent = {
  type: 'round_start',
  round: 2,
  totalRounds: 3,
  seq: 7,
  gameId: 'g1',
  timestamp: '2024-01-01T00:00:00.000Z',
};

test('formatSseEvent: id line plus one JSON data line', () => {
  assert.equal(
    formatSseEvent(event),
    'id: 7\ndata: {"type":"round_start","round":2,"totalRounds":3,"seq":7,"gameId":"g1","timestamp":"2024-01-01T00:00:00.000Z"}\n\n'
  );
  assert.equal(formatSseComment('keep\nalive'), ': keep alive\n\n');
});

test('openSseStream: sets stream headers and stops writing once closed', () => {
  const res = new FakeResponse();
  const stream = openSseStream(res, { keepaliveMs: 0 });

  assert.equal(res.headers['Content-Type'], 'text/event-stream');
  assert.equal(res.headers['Cache-Control'], 'no-cache');
  assert.equal(res.flushed, true);

  stream.send(event);
  stream.close();
  stream.close();
  stream.send(event);

  assert.equal(stream.closed, true);
  assert.deepEqual(res.chunks, [formatSseEvent(event)]);
  assert.equal(res.ended, 1);
});

test('openSseStream: writes keepalive comments on the interval', async () => {
  const res = new FakeResponse();
  const stream = openSseStream(res, { keepaliveMs: 5 });
  await new Promise(resolve => setTimeout(resolve, 30));
  stream.close();

  assert.ok(res.chunks.length >= 1);
  assert.ok(res.chunks.every(c => c === ': keepalive\n\n'));
});
