import type { ChannelMessage, Comment } from '../capabilities/stores';

interface EventBase {
  /** Document id or channel id the watcher is attached to. */
  resourceId: string;
  /** Epoch milliseconds at which the watcher saw the change. */
  observedAt: number;
}

export interface DocChangedEvent extends EventBase {
  kind: 'DocChanged';
  payload: { text: string };
}

export interface CommentAddedEvent extends EventBase {
  kind: 'CommentAdded';
  payload: { comment: Comment };
}

export interface ChannelMessageEvent extends EventBase {
  kind: 'ChannelMessage';
  payload: { message: ChannelMessage };
}

export type ResourceEvent = DocChangedEvent | CommentAddedEvent | ChannelMessageEvent;
export type ResourceEventKind = ResourceEvent['kind'];

/** How the turn sequence triggered by an event ended. */
export type TurnOutcome = 'completed' | 'abandoned' | 'failed' | 'cancelled';

/** Where watchers deliver events. */
export interface EventSink {
  notify(event: ResourceEvent): void;
  /** Resolves once the turn sequence the event started has been reported. */
  notifyAndWait(event: ResourceEvent): Promise<TurnOutcome>;
}

export type WatcherState = 'idle' | 'polling' | 'notifying' | 'stopped';
export type PollResult = 'unchanged' | 'changed';

export interface Watcher {
  readonly name: string;
  readonly state: WatcherState;
  pollOnce(): Promise<PollResult>;
  run(signal: AbortSignal): Promise<void>;
}
