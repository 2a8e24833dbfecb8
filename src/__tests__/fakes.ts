/**
 * In-process stand-ins for the capability providers, LLM providers and the
 * operator console used across the test suite.
 */

import { Logger } from '../utils/logger';
import { ProviderUnavailableError } from '../utils/errors';
import type { ChatChannel, ChannelMessage, Comment, CommentStore, DocumentStore } from '../capabilities/stores';
import type {
  CompletionRequest,
  LLMProvider,
  LLMResponse,
  ToolCall,
  ToolCompletionRequest,
} from '../llm/types';
import { EMPTY_USAGE } from '../llm/types';
import type {
  Completion,
  CompletionService,
  ConversationState,
  InputSource,
  Supervisor,
  Verdict,
} from '../agent/types';
import type { LLMMessage } from '../llm/types';
import type { EventSink, ResourceEvent, TurnOutcome } from '../watchers/types';
import type { MCPServerConfig, MCPTransport, TransportFactory } from '../mcp/transport';

/** Logger that drops everything. */
export const silentLogger = new Logger('error', () => {});

// ---------------------------------------------------------------------------
// Capability providers
// ---------------------------------------------------------------------------

export class FakeDocumentStore implements DocumentStore, CommentStore {
  text: string;
  comments: Comment[] = [];
  readonly rewrites: string[] = [];
  readonly replies: Array<{ commentId: string; reply: string }> = [];
  readonly created: string[] = [];
  readonly deleted: Array<{ commentId: string; replyId: string }> = [];
  reads = 0;
  failRewrite = false;
  failRead = false;

  constructor(text = '') {
    this.text = text;
  }

  async readDoc(): Promise<string> {
    this.reads++;
    if (this.failRead) throw new ProviderUnavailableError('read-doc', 'store offline');
    return this.text;
  }

  async rewriteDocument(_documentId: string, finalText: string): Promise<void> {
    if (this.failRewrite) throw new ProviderUnavailableError('rewrite-document', 'store offline');
    this.rewrites.push(finalText);
    this.text = finalText;
  }

  async readComments(): Promise<Comment[]> {
    return this.comments;
  }

  async createComment(_documentId: string, content: string): Promise<void> {
    this.created.push(content);
  }

  async replyComment(_documentId: string, commentId: string, reply: string): Promise<void> {
    this.replies.push({ commentId, reply });
  }

  async deleteReply(_documentId: string, commentId: string, replyId: string): Promise<void> {
    this.deleted.push({ commentId, replyId });
  }
}

export class FakeChannel implements ChatChannel {
  /** Newest first, like the Slack history API. */
  messages: ChannelMessage[] = [];
  readonly posts: string[] = [];
  readonly reactions: Array<{ timestamp: string; reaction: string }> = [];

  async history(_channelId: string, limit: number): Promise<ChannelMessage[]> {
    return this.messages.slice(0, limit);
  }

  async post(_channelId: string, text: string): Promise<void> {
    this.posts.push(text);
  }

  async react(_channelId: string, timestamp: string, reaction: string): Promise<void> {
    this.reactions.push({ timestamp, reaction });
  }
}

/** Tool served by {@link FakeMcpServer}; throwing reports an error result. */
export type FakeTool = (args: Record<string, unknown>) => string;

/**
 * In-process MCP server. `transport` can be handed to MCPClient or MCPManager
 * as their transport factory.
 */
export class FakeMcpServer {
  readonly calls: Array<{ server: string; name: string; args: Record<string, unknown> }> = [];
  started = 0;
  closed = 0;
  failStart = false;

  constructor(private readonly tools: Record<string, FakeTool>) {}

  readonly transport: TransportFactory = (config: MCPServerConfig): MCPTransport => ({
    start: async () => {
      if (this.failStart) throw new Error('spawn failed');
      this.started++;
    },
    close: async () => {
      this.closed++;
    },
    request: async (method, params) => this.handle(config.name, method, params),
  });

  private handle(server: string, method: string, params: unknown): unknown {
    if (method === 'tools/list') {
      return {
        tools: Object.keys(this.tools).map(name => ({
          name,
          description: `${name} tool`,
          inputSchema: { type: 'object', properties: {} },
        })),
      };
    }

    const request = isRecord(params) ? params : {};
    const name = typeof request.name === 'string' ? request.name : '';
    const args = isRecord(request.arguments) ? request.arguments : {};
    this.calls.push({ server, name, args });

    const tool = this.tools[name];
    if (!tool) throw new Error(`no such tool: ${name}`);
    try {
      return { content: [{ type: 'text', text: tool(args) }] };
    } catch (error) {
      return { content: [{ type: 'text', text: error instanceof Error ? error.message : String(error) }], isError: true };
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function comment(overrides: Partial<Comment> & { id: string }): Comment {
  return {
    content: 'Please add a title',
    modifiedTime: '2024-05-01T10:00:00.000Z',
    resolved: false,
    replies: [],
    ...overrides,
  };
}

/** Event sink that records events and answers waits with a fixed outcome. */
export class RecordingSink implements EventSink {
  readonly events: ResourceEvent[] = [];
  outcome: TurnOutcome = 'completed';

  notify(event: ResourceEvent): void {
    this.events.push(event);
  }

  async notifyAndWait(event: ResourceEvent): Promise<TurnOutcome> {
    this.events.push(event);
    return this.outcome;
  }
}

// ---------------------------------------------------------------------------
// Completion side
// ---------------------------------------------------------------------------

export type ScriptedReply = string | { text: string; toolCall?: ToolCall };

/**
 * Completion service answering from a script; once the script runs out it
 * keeps answering `fallback`. Records the last user message of every call.
 */
export class ScriptedCompletion implements CompletionService {
  readonly prompts: string[] = [];

  constructor(
    private readonly script: ScriptedReply[] = [],
    private readonly fallback = 'Working on it.'
  ) {}

  async complete(state: ConversationState): Promise<Completion> {
    const last = state.messages[state.messages.length - 1];
    this.prompts.push(last ? last.content : '');

    const next = this.script.shift() ?? this.fallback;
    const reply = typeof next === 'string' ? { text: next } : next;
    return {
      text: reply.text,
      toolCall: reply.toolCall,
      messages: [{ role: 'assistant', content: reply.text }],
    };
  }
}

export class ScriptedSupervisor implements Supervisor {
  readonly snapshots: Array<string | null> = [];

  constructor(private readonly answer: (call: number) => Verdict | Error) {}

  get calls(): number {
    return this.snapshots.length;
  }

  async checkDone(snapshot: string | null, _transcript: readonly LLMMessage[]): Promise<Verdict> {
    this.snapshots.push(snapshot);
    const verdict = this.answer(this.snapshots.length);
    if (verdict instanceof Error) throw verdict;
    return verdict;
  }
}

export const complete: Verdict = { task: 'the task', nextSteps: '', isComplete: true };

export function incomplete(nextSteps: string): Verdict {
  return { task: 'the task', nextSteps, isComplete: false };
}

/** LLM provider answering from a script of responses or errors. */
export class FakeProvider implements LLMProvider {
  readonly requests: Array<CompletionRequest | ToolCompletionRequest> = [];
  readonly toolRequests: ToolCompletionRequest[] = [];

  constructor(
    readonly name: string,
    private readonly script: Array<Partial<LLMResponse> | Error> = []
  ) {}

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    this.requests.push(request);
    return this.next();
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse> {
    this.requests.push(request);
    this.toolRequests.push(request);
    return this.next();
  }

  private next(): LLMResponse {
    const entry = this.script.shift() ?? {};
    if (entry instanceof Error) throw entry;
    return {
      content: '',
      usage: EMPTY_USAGE,
      model: 'fake-model',
      finishReason: entry.toolCalls ? 'tool_calls' : 'stop',
      ...entry,
    };
  }
}

export function toolCall(name: string, args: unknown, id = `call-${name}`): ToolCall {
  return { id, type: 'function', function: { name, arguments: JSON.stringify(args) } };
}

// ---------------------------------------------------------------------------
// Operator
// ---------------------------------------------------------------------------

/**
 * Operator input fed from a list of lines. Once the lines run out, `read`
 * stays pending until its signal aborts.
 */
export class ScriptedInput implements InputSource {
  readonly written: string[] = [];
  aborted = 0;

  constructor(private readonly lines: string[] = []) {}

  read(_prompt: string, signal: AbortSignal): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (signal.aborted) return Promise.resolve(null);
    return new Promise(resolve => {
      signal.addEventListener(
        'abort',
        () => {
          this.aborted++;
          resolve(null);
        },
        { once: true }
      );
    });
  }

  write(text: string): void {
    this.written.push(text);
  }
}
