export type {
  ResourceEvent,
  ResourceEventKind,
  DocChangedEvent,
  CommentAddedEvent,
  ChannelMessageEvent,
  TurnOutcome,
  EventSink,
  Watcher,
  WatcherState,
  PollResult,
} from './types';
export { PollingWatcher, DEFAULT_POLL_INTERVAL_MS } from './base';
export type { WatcherOptions } from './base';
export { DocumentWatcher, DEFAULT_DEBOUNCE_MS } from './document-watcher';
export type { DocumentWatcherOptions } from './document-watcher';
export { CommentWatcher } from './comment-watcher';
export { ChannelWatcher, DEFAULT_HISTORY_LIMIT } from './channel-watcher';
export type { ChannelWatcherOptions } from './channel-watcher';
export { markdownToSlack } from './slack-format';
