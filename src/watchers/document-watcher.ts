import type { DocumentStore } from '../capabilities/stores';
import { PollingWatcher, type WatcherOptions } from './base';
import type { EventSink, PollResult } from './types';

export const DEFAULT_DEBOUNCE_MS = 30_000;

export interface DocumentWatcherOptions extends WatcherOptions {
  /** Minimum time between two DocChanged notifications. */
  debounceMs?: number;
  /**
   * Plain texts the session wrote itself. A fetched body equal to any of
   * them is the session's own edit and is not reported.
   */
  ownTexts?: () => readonly string[];
}

function normalize(text: string): string {
  return text.replace(/\r\n?/g, '\n').trimEnd();
}

/**
 * Reports document body changes. Edits arriving within the debounce window
 * of the previous notification are folded into the last seen body without a
 * new event.
 */
export class DocumentWatcher extends PollingWatcher {
  readonly name = 'watcher:document';
  private readonly debounceMs: number;
  private readonly ownTexts: () => readonly string[];
  private lastSeen: string | undefined;
  private lastNotifiedAt = Number.NEGATIVE_INFINITY;

  constructor(
    documentId: string,
    private readonly documents: DocumentStore,
    sink: EventSink,
    options: DocumentWatcherOptions = {}
  ) {
    super(documentId, sink, options);
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.ownTexts = options.ownTexts ?? (() => []);
  }

  protected async poll(): Promise<PollResult> {
    const text = await this.documents.readDoc(this.resourceId);

    if (this.lastSeen === undefined) {
      this.lastSeen = text;
      return 'unchanged';
    }
    if (text === this.lastSeen) {
      return 'unchanged';
    }
    this.lastSeen = text;

    const body = normalize(text);
    if (this.ownTexts().some(own => normalize(own) === body)) {
      this.log.debug('Change matches a session write; ignoring own write');
      return 'unchanged';
    }

    const now = this.now();
    if (now - this.lastNotifiedAt < this.debounceMs) {
      this.log.debug('Change within debounce window; not notifying');
      return 'unchanged';
    }

    this.lastNotifiedAt = now;
    this.emit({ kind: 'DocChanged', resourceId: this.resourceId, payload: { text }, observedAt: now });
    return 'changed';
  }
}
