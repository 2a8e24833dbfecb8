/** Prefix that marks a reply or message as written by the agent itself. */
export const OWN_REPLY_MARKER = '[BOT COMMENT]:';

/** Posted on a comment as soon as it is picked up. */
export const ACK_REPLY = `${OWN_REPLY_MARKER}\n👀`;

/** Reaction placed on a channel message as soon as it is picked up. */
export const ACK_REACTION = 'eyes';

export function isOwnReply(text: string | undefined): boolean {
  return text !== undefined && text.trimStart().startsWith(OWN_REPLY_MARKER);
}

export function markOwnReply(text: string): string {
  return `${OWN_REPLY_MARKER}\n${text}`;
}
