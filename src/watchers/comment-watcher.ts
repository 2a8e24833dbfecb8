import type { CommentStore } from '../capabilities/stores';
import { ACK_REPLY, isOwnReply } from '../capabilities/markers';
import { PollingWatcher, type WatcherOptions } from './base';
import type { EventSink, PollResult } from './types';

/**
 * Reports new or edited comments on a document.
 *
 * A picked-up comment is acknowledged with a reply before the event is
 * emitted, and the watermark then moves to the current time rather than the
 * comment's own timestamp. Other comments from the same fetch whose
 * modifiedTime falls before that point are therefore skipped.
 */
export class CommentWatcher extends PollingWatcher {
  readonly name = 'watcher:comments';
  private lastNotified = 0;

  constructor(
    documentId: string,
    private readonly comments: CommentStore,
    sink: EventSink,
    options: WatcherOptions = {}
  ) {
    super(documentId, sink, options);
  }

  get watermark(): number {
    return this.lastNotified;
  }

  protected async poll(): Promise<PollResult> {
    const comments = await this.comments.readComments(this.resourceId);
    let result: PollResult = 'unchanged';

    for (const comment of comments) {
      const modified = Date.parse(comment.modifiedTime);
      if (Number.isNaN(modified)) {
        this.log.debug(`Skipping comment ${comment.id} with unreadable modifiedTime`);
        continue;
      }
      if (comment.resolved || modified <= this.lastNotified) continue;

      const lastReply = comment.replies[comment.replies.length - 1];
      if (isOwnReply(lastReply?.content)) continue;

      await this.comments.replyComment(this.resourceId, comment.id, ACK_REPLY);
      const now = this.now();
      this.emit({
        kind: 'CommentAdded',
        resourceId: this.resourceId,
        payload: { comment },
        observedAt: now,
      });
      this.lastNotified = now;
      result = 'changed';
    }

    return result;
  }
}
