/**
 * Input sources deliver events to the annotation loop one at a time.
 */

import type { Disposable } from '../../core/ManagerBase';
import type { InputEvent } from './InputEvents';

export type InputPoll =
  | { kind: 'event'; event: InputEvent }
  /** No event arrived within the wait */
  | { kind: 'idle' }
  /** The source is exhausted and will never produce another event */
  | { kind: 'end' }
  /** The source broke off; no further events will arrive */
  | { kind: 'error'; error: Error };

export interface InputSource extends Disposable {
  /** Wait at most `timeoutMs` for the next event. */
  next(timeoutMs: number): Promise<InputPoll>;
}

/**
 * In-memory FIFO source. Producers call push()/end() or fail(); the
 * annotation loop polls with next(). Also the base of stream-backed sources.
 */
export class QueuedInputSource implements InputSource {
  private queue: InputEvent[] = [];
  private ended = false;
  private failure: Error | null = null;
  private waiter: (() => void) | null = null;

  push(...events: InputEvent[]): void {
    if (this.ended) return;
    this.queue.push(...events);
    this.wake();
  }

  /** Mark the source exhausted; queued events are still delivered. */
  end(): void {
    this.ended = true;
    this.wake();
  }

  /**
   * End the source with an error. Queued events are still delivered, then
   * every poll reports the error. Only the first failure is kept.
   */
  fail(error: Error): void {
    if (this.failure === null) {
      this.failure = error;
    }
    this.end();
  }

  get pending(): number {
    return this.queue.length;
  }

  async next(timeoutMs: number): Promise<InputPoll> {
    const ready = this.take();
    if (ready) return ready;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve();
      }, timeoutMs);
      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = null;
        resolve();
      };
    });

    return this.take() ?? { kind: 'idle' };
  }

  dispose(): void {
    this.queue = [];
    this.end();
  }

  private take(): InputPoll | null {
    const event = this.queue.shift();
    if (event) return { kind: 'event', event };
    if (this.failure) return { kind: 'error', error: this.failure };
    if (this.ended) return { kind: 'end' };
    return null;
  }

  private wake(): void {
    this.waiter?.();
  }
}
