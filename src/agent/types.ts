/**
 * Session Types
 *
 * Shapes owned by the session controller and the collaborators it is built
 * from.
 *
 * @module agent/types
 */

import type { LLMMessage, ToolCall } from '../llm/types';
import type { ChatChannel, CommentStore, DocumentStore } from '../capabilities/stores';
import type { ResourceEvent } from '../watchers/types';

// ---------------------------------------------------------------------------
// Session state
// ---------------------------------------------------------------------------

/** Where the turn sequence in progress came from; decides where its report goes. */
export type InteractionOrigin = 'cli' | 'comment' | 'channel' | 'document';

export type ControllerPhase = 'idle' | 'awaiting-input' | 'turn' | 'verifying' | 'reporting' | 'stopped';

export interface SessionState {
  conversationId: string;
  /** Marked document as last read back from the store; null for channels or before the first read. */
  documentSnapshot: string | null;
  interactionOrigin: InteractionOrigin;
  /** Comment id or message timestamp of the remote origin. */
  originId: string | null;
  /** Continuation prompts sent in the current turn sequence. */
  iterationCount: number;
  pendingEvent: ResourceEvent | null;
}

/** The external resource a session is attached to, with the stores that serve it. */
export type SessionResource =
  | { kind: 'document'; id: string; documents: DocumentStore; comments: CommentStore }
  | { kind: 'channel'; id: string; channel: ChatChannel };

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface ConversationState {
  system: string;
  messages: readonly LLMMessage[];
}

/** One completion-service round. */
export interface Completion {
  text: string;
  /** First tool invocation of the response, if it made any. */
  toolCall?: ToolCall;
  /** Messages to append to the conversation: the assistant reply and any tool results. */
  messages: LLMMessage[];
}

export interface CompletionService {
  complete(state: ConversationState): Promise<Completion>;
}

export interface Verdict {
  task: string;
  nextSteps: string;
  isComplete: boolean;
}

export interface Supervisor {
  checkDone(snapshot: string | null, transcript: readonly LLMMessage[]): Promise<Verdict>;
}

/** Local operator input. `read` resolves null when aborted or when input has ended. */
export interface InputSource {
  read(prompt: string, signal: AbortSignal): Promise<string | null>;
  write(text: string): void;
}
