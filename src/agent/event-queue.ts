/**
 * Event Queue
 *
 * The session's single inbox for watcher events. Events are handled one at a
 * time in arrival order; an event queued while a turn is running waits for
 * that turn to finish.
 *
 * @module agent/event-queue
 */

import { logger } from '../utils';
import type { EventSink, ResourceEvent, TurnOutcome } from '../watchers/types';

export interface QueuedEvent {
  event: ResourceEvent;
  /** Present when the sender waits for the outcome of the turn it triggers. */
  settle?: (outcome: TurnOutcome) => void;
}

export class EventQueue implements EventSink {
  private items: QueuedEvent[] = [];
  private readonly waiters = new Set<() => void>();
  private isClosed = false;

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  notify(event: ResourceEvent): void {
    if (this.isClosed) {
      logger.debug(`Dropping ${event.kind} for ${event.resourceId}: queue closed`);
      return;
    }
    this.items.push({ event });
    this.wake();
  }

  notifyAndWait(event: ResourceEvent): Promise<TurnOutcome> {
    if (this.isClosed) {
      return Promise.resolve('cancelled');
    }
    return new Promise(resolve => {
      this.items.push({ event, settle: resolve });
      this.wake();
    });
  }

  shift(): QueuedEvent | undefined {
    return this.items.shift();
  }

  /**
   * Resolves true once an event is queued, false when the signal aborts or
   * the queue closes first.
   */
  waitForEvent(signal: AbortSignal): Promise<boolean> {
    if (this.items.length > 0) return Promise.resolve(true);
    if (this.isClosed || signal.aborted) return Promise.resolve(false);

    return new Promise(resolve => {
      const onAbort = (): void => {
        this.waiters.delete(wake);
        resolve(false);
      };
      const wake = (): void => {
        signal.removeEventListener('abort', onAbort);
        this.waiters.delete(wake);
        resolve(this.items.length > 0);
      };
      this.waiters.add(wake);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Stop accepting events; senders still waiting get 'cancelled'. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const pending = this.items;
    this.items = [];
    for (const item of pending) item.settle?.('cancelled');
    this.wake();
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
