/**
 * Prompt Texts
 *
 * Everything the session says to the completion service. The marker and
 * patch grammar described in the system prompt must match
 * `sections/protocol` and `sections/patch-blocks`.
 *
 * @module agent/prompts
 */

import { SECTION_END, sectionStart, unwrap } from '../sections';
import { isOwnReply } from '../capabilities/markers';
import type { Comment, ChannelMessage } from '../capabilities/stores';

export type ResourceKind = 'document' | 'channel';

export interface SystemPromptOptions {
  kind: ResourceKind;
  resourceId: string;
  /** Extra instructions configured for this agent. */
  instructions?: string;
}

const DOCUMENT_GRAMMAR = `The document is shown split into sections. Each section looks like:

${sectionStart('section1')}
...section text...
${SECTION_END}

To change the document, answer with one or more fenced blocks. Label a block
with a section id to replace that section's text:

\`\`\`section2
new text for section 2
\`\`\`

A block labeled with an id that does not exist yet is appended as a new
section. An unlabeled block replaces the entire document and every other block
in the same answer is ignored. Never write the section markers yourself.
Only fenced blocks change the document; code samples you want to keep in the
document belong inside a section block.`;

export function buildSystemPrompt(options: SystemPromptOptions): string {
  const parts: string[] = [];

  if (options.kind === 'document') {
    parts.push(
      `You are an assistant working inside the shared document "${options.resourceId}". ` +
        'People ask you for changes through the console or through comments on the document.'
    );
    parts.push(DOCUMENT_GRAMMAR);
  } else {
    parts.push(
      `You are an assistant answering messages in the chat channel "${options.resourceId}". ` +
        'Keep replies short and use Markdown links for URLs.'
    );
  }

  parts.push('You may call the available tools when you need information or need to act outside the conversation.');

  if (options.instructions) {
    parts.push(`Additional instructions:\n${options.instructions}`);
  }

  return parts.join('\n\n');
}

/** Current document in both forms, appended to prompts that start or continue work. */
export function documentContext(snapshot: string | null): string {
  if (snapshot === null) return '';
  return `\n\nThe document currently reads:\n${unwrap(snapshot)}\n\nThe sectioned document:\n${snapshot}`;
}

/** The comment and the thread's replies from people; the agent's own replies are left out. */
export function commentPrompt(comment: Comment): string {
  const prompt = `A new comment was left on the document:\n${comment.content}`;
  const replies = comment.replies.filter(reply => reply.content !== '' && !isOwnReply(reply.content));
  if (replies.length === 0) return prompt;
  return `${prompt}\n\nReplies in the thread, oldest first:\n${replies.map(reply => `- ${reply.content}`).join('\n')}`;
}

export function docChangedPrompt(): string {
  return 'The document was edited by someone else. Review the change and act on any requests it contains.';
}

export function channelPrompt(message: ChannelMessage): string {
  const author = message.user ? ` from ${message.user}` : '';
  return `New message${author} in the channel:\n${message.text}`;
}

export function continuationPrompt(nextSteps: string): string {
  return `You're not quite done:\n${nextSteps}\nPlease continue`;
}

export const CONTINUE_PROMPT = 'continue';

export const SUMMARY_PROMPT = 'Looks like you completed the task, please summarize your work.';

export const DIFFICULTY_PROMPT =
  "It sounds like you're having difficulty with this task. Summarize what you did and what is still missing.";

export const MALFORMED_EDIT_PROMPT =
  'Your last answer opened a fenced block that could not be read as an edit, so the document was not changed. ' +
  'Each edit must be a complete fenced block: the opening fence with an optional section id on its own line, ' +
  'the new text, then a closing fence on its own line.';

export function unreadableDocumentNotice(reason: string): string {
  return `Note: the document could not be read (${reason}), so your previous edit was not applied. The document is unchanged.\n\n`;
}

export function writeBackNotice(reason: string): string {
  return `Note: your previous edit could not be saved to the document (${reason}). The document is unchanged.\n\n`;
}

export function completedReport(summary: string): string {
  return `Task Completed: ${summary}`;
}

export function failedReport(reason: string): string {
  return `I ran into a problem and could not finish this request: ${reason}`;
}

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export const SUPERVISOR_INSTRUCTIONS = `You are a supervisor reviewing an assistant's work.
Decide whether the task the user asked for has been completed.
The work only counts if it is reflected in the document itself; an assistant
saying it made a change is not enough. Be pedantic about formatting.
Answer by calling the done tool.`;

export function supervisorPrompt(transcript: string, snapshot: string | null): string {
  const document =
    snapshot === null
      ? 'There is no document for this session; judge from the conversation.'
      : `The document as displayed:\n${unwrap(snapshot)}\n\nThe document as sectioned:\n${snapshot}`;
  return `Conversation so far:\n${transcript}\n\n${document}`;
}
