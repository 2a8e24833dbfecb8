import { logger as rootLogger, sleep, type Logger } from '../utils';
import type { EventSink, PollResult, ResourceEvent, TurnOutcome, Watcher, WatcherState } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export interface WatcherOptions {
  pollIntervalMs?: number;
  /** Clock used for timestamps and debouncing. */
  now?: () => number;
  logger?: Logger;
}

/**
 * Fixed-interval polling loop. Subclasses implement one cycle in `poll`; a
 * cycle that throws is logged and retried after the normal interval without
 * touching any dedup state.
 */
export abstract class PollingWatcher implements Watcher {
  abstract readonly name: string;
  protected readonly pollIntervalMs: number;
  protected readonly now: () => number;
  private currentState: WatcherState = 'idle';
  private scopedLogger: Logger | undefined;

  constructor(
    protected readonly resourceId: string,
    protected readonly sink: EventSink,
    private readonly options: WatcherOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get state(): WatcherState {
    return this.currentState;
  }

  protected get log(): Logger {
    this.scopedLogger ??= (this.options.logger ?? rootLogger).child(`${this.name}:${this.resourceId}`);
    return this.scopedLogger;
  }

  protected abstract poll(): Promise<PollResult>;

  async pollOnce(): Promise<PollResult> {
    if (this.currentState === 'stopped') return 'unchanged';
    this.currentState = 'polling';
    try {
      return await this.poll();
    } finally {
      if (this.state !== 'stopped') this.currentState = 'idle';
    }
  }

  async run(signal: AbortSignal): Promise<void> {
    this.currentState = 'idle';
    this.log.info(`Watching every ${this.pollIntervalMs}ms`);
    while (!signal.aborted) {
      try {
        const result = await this.pollOnce();
        this.log.debug(`Cycle ${result}`);
      } catch (error) {
        this.log.error('Poll cycle failed', error);
      }
      if (!(await sleep(this.pollIntervalMs, signal))) break;
    }
    this.currentState = 'stopped';
    this.log.info('Stopped');
  }

  protected emit(event: ResourceEvent): void {
    this.currentState = 'notifying';
    this.log.info(`Emitting ${event.kind}`);
    this.sink.notify(event);
  }

  protected async emitAndWait(event: ResourceEvent): Promise<TurnOutcome> {
    this.currentState = 'notifying';
    this.log.info(`Emitting ${event.kind} and waiting for the turn to finish`);
    return this.sink.notifyAndWait(event);
  }
}
