import type { GameEvent } from '../events/types.js';

/** The slice of an HTTP response an event stream writes to. */
export interface SseTarget {
  setHeader(name: string, value: string): unknown;
  flushHeaders?(): void;
  write(chunk: string): boolean;
  end(): unknown;
}

export const SSE_KEEPALIVE_MS = 15_000;

export function formatSseEvent(event: GameEvent): string {
  return `id: ${event.seq}\ndata: ${JSON.stringify(event)}\n\n`;
}

export function formatSseComment(text: string): string {
  return `: ${text.replace(/\n/g, ' ')}\n\n`;
}

export interface SseStream {
  send(event: GameEvent): void;
  close(): void;
  readonly closed: boolean;
}

/**
 * Starts an event stream on `target`. A comment line goes out every
 * `keepaliveMs` so proxies keep the connection open while a model thinks.
 */
export function openSseStream(target: SseTarget, opts?: { keepaliveMs?: number }): SseStream {
  target.setHeader('Content-Type', 'text/event-stream');
  target.setHeader('Cache-Control', 'no-cache');
  target.setHeader('Connection', 'keep-alive');
  target.setHeader('X-Accel-Buffering', 'no');
  target.flushHeaders?.();

  let closed = false;
  const keepaliveMs = opts?.keepaliveMs ?? SSE_KEEPALIVE_MS;
  const timer = keepaliveMs > 0 ? setInterval(() => target.write(formatSseComment('keepalive')), keepaliveMs) : undefined;
  timer?.unref();

  return {
    send(event) {
      if (!closed) target.write(formatSseEvent(event));
    },
    close() {
      if (closed) return;
      closed = true;
      if (timer) clearInterval(timer);
      target.end();
    },
    get closed() {
      return closed;
    },
  };
}
