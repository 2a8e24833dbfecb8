/**
 * Wire operations consumed from capability providers, each with the
 * parameters it takes. Parameter names are the providers' wire contract.
 */

import { z } from 'zod';

export const operationParams = {
  'read-doc': z.object({ document_id: z.string().min(1) }),
  'rewrite-document': z.object({ document_id: z.string().min(1), final_text: z.string() }),
  'read-comments': z.object({ document_id: z.string().min(1) }),
  'create-comment': z.object({ document_id: z.string().min(1), content: z.string() }),
  'reply-comment': z.object({
    document_id: z.string().min(1),
    comment_id: z.string().min(1),
    reply: z.string(),
  }),
  'delete-reply': z.object({
    document_id: z.string().min(1),
    comment_id: z.string().min(1),
    reply_id: z.string().min(1),
  }),
  'channel-history': z.object({ channel_id: z.string().min(1), limit: z.number().int().positive() }),
  'channel-post': z.object({ channel_id: z.string().min(1), text: z.string() }),
  'channel-react': z.object({
    channel_id: z.string().min(1),
    timestamp: z.string().min(1),
    reaction: z.string().min(1),
  }),
};

export type OperationName = keyof typeof operationParams;
export type OperationParams<K extends OperationName> = z.infer<(typeof operationParams)[K]>;

export const OPERATION_NAMES = Object.keys(operationParams).filter(isOperationName);

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(operationParams, name);
}

/** Operations a document session needs. */
export const DOCUMENT_OPERATIONS: readonly OperationName[] = [
  'read-doc',
  'rewrite-document',
  'read-comments',
  'create-comment',
  'reply-comment',
  'delete-reply',
];

/** Operations a channel session needs. */
export const CHANNEL_OPERATIONS: readonly OperationName[] = [
  'channel-history',
  'channel-post',
  'channel-react',
];

/**
 * Tool name each operation is advertised under on MCP servers. Document
 * operations use their wire names; channel operations follow the Slack MCP
 * server.
 */
export const DEFAULT_OPERATION_TOOLS: Record<OperationName, string> = {
  'read-doc': 'read-doc',
  'rewrite-document': 'rewrite-document',
  'read-comments': 'read-comments',
  'create-comment': 'create-comment',
  'reply-comment': 'reply-comment',
  'delete-reply': 'delete-reply',
  'channel-history': 'slack_get_channel_history',
  'channel-post': 'slack_post_message',
  'channel-react': 'slack_add_reaction',
};
