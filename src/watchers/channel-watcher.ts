import type { ChannelMessage, ChatChannel } from '../capabilities/stores';
import { ACK_REACTION, isOwnReply } from '../capabilities/markers';
import { PollingWatcher, type WatcherOptions } from './base';
import type { EventSink, PollResult } from './types';

export const DEFAULT_HISTORY_LIMIT = 10;

export interface ChannelWatcherOptions extends WatcherOptions {
  historyLimit?: number;
}

function timestampOf(message: ChannelMessage): number {
  return Number(message.ts);
}

/**
 * Reports new channel messages one at a time, oldest first. Each message is
 * acknowledged with a reaction and the watermark only moves past it once the
 * turn it started has been reported back to the channel.
 *
 * On the first cycle only the newest unanswered message is picked up; older
 * history counts as already seen.
 */
export class ChannelWatcher extends PollingWatcher {
  readonly name = 'watcher:channel';
  private readonly historyLimit: number;
  private lastNotified: number | undefined;

  constructor(
    channelId: string,
    private readonly channel: ChatChannel,
    sink: EventSink,
    options: ChannelWatcherOptions = {}
  ) {
    super(channelId, sink, options);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  get watermark(): number | undefined {
    return this.lastNotified;
  }

  protected async poll(): Promise<PollResult> {
    const messages = (await this.channel.history(this.resourceId, this.historyLimit)).filter(
      m => !Number.isNaN(timestampOf(m))
    );
    const newest = messages[0];
    if (!newest) return 'unchanged';

    if (isOwnReply(newest.text)) {
      this.lastNotified ??= timestampOf(newest);
      return 'unchanged';
    }

    const latestOwn = Math.max(
      Number.NEGATIVE_INFINITY,
      ...messages.filter(m => isOwnReply(m.text)).map(timestampOf)
    );
    const floor = Math.max(latestOwn, this.lastNotified ?? Number.NEGATIVE_INFINITY);

    let pending = messages
      .filter(m => !isOwnReply(m.text) && timestampOf(m) > floor)
      .sort((a, b) => timestampOf(a) - timestampOf(b));
    if (this.lastNotified === undefined) {
      pending = pending.slice(-1);
    }

    let result: PollResult = 'unchanged';
    for (const message of pending) {
      await this.channel.react(this.resourceId, message.ts, ACK_REACTION);
      const outcome = await this.emitAndWait({
        kind: 'ChannelMessage',
        resourceId: this.resourceId,
        payload: { message },
        observedAt: this.now(),
      });
      result = 'changed';
      if (outcome === 'cancelled') {
        this.log.info(`Turn for message ${message.ts} was cancelled; not advancing`);
        break;
      }
      this.lastNotified = timestampOf(message);
    }

    return result;
  }
}
