/**
 * Typed adapters over the capability registry. Each parses the provider's
 * free-form `output` into the shapes the watchers and controller use.
 */

import { z } from 'zod';
import { ProviderUnavailableError, logger } from '../utils';
import type { CapabilityInvoker } from './registry';
import { ACK_REPLY } from './markers';

const replySchema = z.object({
  id: z.string(),
  content: z.string().default(''),
});

const commentSchema = z.object({
  id: z.string(),
  content: z.string().default(''),
  // Missing timestamps parse to NaN; the comment watcher skips such comments.
  modifiedTime: z.string().default(''),
  resolved: z.boolean().default(false),
  replies: z.array(replySchema).default([]),
});

const commentListSchema = z.union([
  z.array(commentSchema),
  z.object({ comments: z.array(commentSchema) }).transform(v => v.comments),
]);

const channelMessageSchema = z.object({
  ts: z.string(),
  text: z.string().default(''),
  user: z.string().optional(),
});

const historySchema = z.object({
  messages: z.array(channelMessageSchema).default([]),
});

export type CommentReply = z.infer<typeof replySchema>;
export type Comment = z.infer<typeof commentSchema>;
export type ChannelMessage = z.infer<typeof channelMessageSchema>;

export interface DocumentStore {
  readDoc(documentId: string): Promise<string>;
  rewriteDocument(documentId: string, finalText: string): Promise<void>;
}

export interface CommentStore {
  readComments(documentId: string): Promise<Comment[]>;
  createComment(documentId: string, content: string): Promise<void>;
  replyComment(documentId: string, commentId: string, reply: string): Promise<void>;
  deleteReply(documentId: string, commentId: string, replyId: string): Promise<void>;
}

export interface ChatChannel {
  /** Most recent messages, newest first. */
  history(channelId: string, limit: number): Promise<ChannelMessage[]>;
  post(channelId: string, text: string): Promise<void>;
  react(channelId: string, timestamp: string, reaction: string): Promise<void>;
}

function parseJsonOutput<T>(operation: string, output: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    throw new ProviderUnavailableError(operation, 'output is not valid JSON', { preview: output.slice(0, 200) });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderUnavailableError(operation, 'output has an unexpected shape', parsed.error.issues);
  }
  return parsed.data;
}

export class RemoteDocumentStore implements DocumentStore, CommentStore {
  constructor(private readonly capabilities: CapabilityInvoker) {}

  async readDoc(documentId: string): Promise<string> {
    const { output } = await this.capabilities.call('read-doc', { document_id: documentId });
    return output;
  }

  async rewriteDocument(documentId: string, finalText: string): Promise<void> {
    await this.capabilities.call('rewrite-document', { document_id: documentId, final_text: finalText });
  }

  async readComments(documentId: string): Promise<Comment[]> {
    const { output } = await this.capabilities.call('read-comments', { document_id: documentId });
    if (output.trim() === '') return [];
    return parseJsonOutput('read-comments', output, commentListSchema);
  }

  async createComment(documentId: string, content: string): Promise<void> {
    await this.capabilities.call('create-comment', { document_id: documentId, content });
  }

  async replyComment(documentId: string, commentId: string, reply: string): Promise<void> {
    await this.capabilities.call('reply-comment', {
      document_id: documentId,
      comment_id: commentId,
      reply,
    });
  }

  async deleteReply(documentId: string, commentId: string, replyId: string): Promise<void> {
    await this.capabilities.call('delete-reply', {
      document_id: documentId,
      comment_id: commentId,
      reply_id: replyId,
    });
  }
}

export class RemoteChatChannel implements ChatChannel {
  constructor(private readonly capabilities: CapabilityInvoker) {}

  async history(channelId: string, limit: number): Promise<ChannelMessage[]> {
    const { output } = await this.capabilities.call('channel-history', { channel_id: channelId, limit });
    return parseJsonOutput('channel-history', output, historySchema).messages;
  }

  async post(channelId: string, text: string): Promise<void> {
    await this.capabilities.call('channel-post', { channel_id: channelId, text });
  }

  async react(channelId: string, timestamp: string, reaction: string): Promise<void> {
    await this.capabilities.call('channel-react', { channel_id: channelId, timestamp, reaction });
  }
}

/**
 * Remove acknowledgment replies left behind by a previous run that stopped
 * before answering, so those comments are picked up again. Returns the number
 * of replies removed.
 */
export async function clearStaleAcks(comments: CommentStore, documentId: string): Promise<number> {
  let removed = 0;
  for (const comment of await comments.readComments(documentId)) {
    const last = comment.replies[comment.replies.length - 1];
    if (comment.resolved || !last || last.content !== ACK_REPLY) continue;
    await comments.deleteReply(documentId, comment.id, last.id);
    logger.info(`Cleared stale acknowledgment on comment ${comment.id}`);
    removed++;
  }
  return removed;
}
