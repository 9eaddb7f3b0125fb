/**
 * event-loop.ts — single-consumer event queue.
 *
 * Events are applied one at a time, in arrival order. Events posted while a
 * handler is running are queued behind it, never applied re-entrantly.
 * Background work (provider calls, skills, saves) only ever posts events.
 */

export type EventHandler<E> = (event: E) => void;
export type EventErrorHandler<E> = (error: unknown, event: E) => void;

export class EventLoop<E> {
  private queue: E[] = [];
  private draining = false;

  constructor(
    private readonly handle: EventHandler<E>,
    private readonly onError: EventErrorHandler<E>,
  ) {}

  post(event: E): void {
    this.queue.push(event);
    if (!this.draining) {
      this.drain();
    }
  }

  /** Events waiting to be applied */
  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.draining;
  }

  private drain(): void {
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event !== undefined) {
        try {
          this.handle(event);
        } catch (err) {
          this.onError(err, event);
        }
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
