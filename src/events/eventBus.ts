export type Unsubscribe = () => void;

/**
 * Synchronous, ordered event bus. One per game engine.
 *
 * Subscriber failures never reach the emitter; they are handed to `onError`
 * when one is given.
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();
  private readonly onError?: (error: unknown) => void;

  constructor(opts?: { onError?: (error: unknown) => void }) {
    this.onError = opts?.onError;
  }

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch (error) {
        this.onError?.(error);
      }
    }
  }
}
