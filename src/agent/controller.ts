/**
 * Session Controller
 *
 * Owns the state of one session (one document or one channel) and drives
 * its turn loop:
 *
 *   awaiting-input → turn → verifying → (turn | reporting) → awaiting-input
 *
 * While awaiting input, a read from the local operator races the next event
 * from the session's watchers; whichever arrives first starts a turn sequence
 * and the other wait is cancelled. Events that arrive during a turn are
 * queued, so at most one turn sequence runs at a time.
 *
 * @module agent/controller
 */

import {
  errorMessage,
  logger as rootLogger,
  MalformedEditError,
  ProviderUnavailableError,
  ValidationError,
  type Logger,
} from '../utils';
import { applyPatchSet, DEFAULT_MAX_CHUNK_SIZE, extractPatchBlocks, hasFence, unwrap, wrap } from '../sections';
import { markOwnReply } from '../capabilities/markers';
import { markdownToSlack } from '../watchers/slack-format';
import type { ResourceEvent, TurnOutcome, Watcher } from '../watchers/types';
import type { EventQueue, QueuedEvent } from './event-queue';
import { Conversation } from './conversation';
import {
  buildSystemPrompt,
  channelPrompt,
  commentPrompt,
  completedReport,
  CONTINUE_PROMPT,
  continuationPrompt,
  DIFFICULTY_PROMPT,
  docChangedPrompt,
  documentContext,
  failedReport,
  MALFORMED_EDIT_PROMPT,
  SUMMARY_PROMPT,
  unreadableDocumentNotice,
  writeBackNotice,
} from './prompts';
import type {
  Completion,
  CompletionService,
  ControllerPhase,
  InputSource,
  InteractionOrigin,
  SessionResource,
  SessionState,
  Supervisor,
  Verdict,
} from './types';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_ITERATIONS = 5;

export interface SessionControllerOptions {
  /** Continuation prompts allowed per turn sequence before giving up (default: 5). */
  maxIterations: number;
  maxChunkSize: number;
  /** Synthetic "continue" prompts allowed after tool calls within one turn (default: 10). */
  maxToolContinuations: number;
  /** Supervisor calls per verification round before treating it as incomplete (default: 2). */
  supervisorAttempts: number;
  exitCommand: string;
  /** Extra instructions appended to the system prompt. */
  instructions?: string;
  /** Text shown when reading operator input. */
  inputPrompt: string;
}

const DEFAULT_OPTIONS: SessionControllerOptions = {
  maxIterations: DEFAULT_MAX_ITERATIONS,
  maxChunkSize: DEFAULT_MAX_CHUNK_SIZE,
  maxToolContinuations: 10,
  supervisorAttempts: 2,
  exitCommand: 'exit',
  inputPrompt: '> ',
};

export interface SessionControllerDeps {
  resource: SessionResource;
  completion: CompletionService;
  supervisor: Supervisor;
  queue: EventQueue;
  /** Local operator; sessions without one are driven by events alone. */
  input?: InputSource;
  options?: Partial<SessionControllerOptions>;
  logger?: Logger;
}

/** A unit of work that starts a turn sequence. */
interface TurnRequest {
  prompt: string;
  origin: InteractionOrigin;
  originId: string | null;
  queued?: QueuedEvent;
}

type EditResult = 'none' | 'applied' | 'malformed' | 'failed';

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class SessionController {
  private readonly resource: SessionResource;
  private readonly completion: CompletionService;
  private readonly supervisor: Supervisor;
  private readonly queue: EventQueue;
  private input: InputSource | undefined;
  private readonly options: SessionControllerOptions;
  private readonly log: Logger;
  private readonly conversation: Conversation;
  private readonly shutdown = new AbortController();
  private readonly watchers: Watcher[] = [];
  private currentState: SessionState;
  private currentPhase: ControllerPhase = 'idle';
  private pendingNotice = '';
  /** Plain text of a write-back that has not been re-read yet. */
  private pendingWrite: string | undefined;
  private running = false;

  constructor(deps: SessionControllerDeps) {
    this.resource = deps.resource;
    this.completion = deps.completion;
    this.supervisor = deps.supervisor;
    this.queue = deps.queue;
    this.input = deps.input;
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.log = (deps.logger ?? rootLogger).child(`session:${deps.resource.kind}:${deps.resource.id}`);
    this.conversation = new Conversation(
      buildSystemPrompt({
        kind: deps.resource.kind,
        resourceId: deps.resource.id,
        instructions: this.options.instructions,
      })
    );
    this.currentState = {
      conversationId: this.conversation.id,
      documentSnapshot: null,
      interactionOrigin: 'cli',
      originId: null,
      iterationCount: 0,
      pendingEvent: null,
    };
  }

  get state(): Readonly<SessionState> {
    return this.currentState;
  }

  get phase(): ControllerPhase {
    return this.currentPhase;
  }

  /** Plain text of the current snapshot; the document watcher uses it to skip the session's own writes. */
  displayedText(): string | undefined {
    const snapshot = this.currentState.documentSnapshot;
    return snapshot === null ? undefined : unwrap(snapshot);
  }

  /**
   * Bodies the session itself put in the document: the current snapshot and
   * a write-back still waiting for its re-read. The document watcher skips them.
   */
  ownTexts(): string[] {
    const texts: string[] = [];
    const shown = this.displayedText();
    if (shown !== undefined) texts.push(shown);
    if (this.pendingWrite !== undefined) texts.push(this.pendingWrite);
    return texts;
  }

  /** Watchers to start with the session and stop with it. */
  attach(...watchers: Watcher[]): this {
    this.watchers.push(...watchers);
    return this;
  }

  /** Ask the session to end after the current turn sequence. */
  stop(): void {
    if (!this.shutdown.signal.aborted) {
      this.log.info('Stopping session');
      this.shutdown.abort();
    }
  }

  /**
   * Run until the exit command is entered or `stop` is called. Watchers are
   * started here and awaited before returning.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new ValidationError('Session is already running');
    }
    this.running = true;

    const watcherRuns = this.watchers.map(watcher => watcher.run(this.shutdown.signal));
    try {
      await this.loadDocument();
      while (!this.shutdown.signal.aborted) {
        const request = await this.awaitInput();
        if (!request) break;
        await this.runTurnSequence(request);
      }
    } finally {
      this.shutdown.abort();
      this.queue.close();
      await Promise.all(watcherRuns);
      this.currentPhase = 'stopped';
      this.log.info('Session ended');
    }
  }

  // -------------------------------------------------------------------------
  // Awaiting input
  // -------------------------------------------------------------------------

  private async awaitInput(): Promise<TurnRequest | null> {
    this.currentPhase = 'awaiting-input';

    while (!this.shutdown.signal.aborted) {
      const queued = this.queue.shift();
      if (queued) return this.fromEvent(queued);
      if (this.queue.closed) return null;

      const input = this.input;
      if (!input) {
        await this.queue.waitForEvent(this.shutdown.signal);
        continue;
      }

      const race = new AbortController();
      const cancelRace = (): void => race.abort();
      this.shutdown.signal.addEventListener('abort', cancelRace, { once: true });
      try {
        const winner = await Promise.race([
          input.read(this.options.inputPrompt, race.signal).then(line => ({ source: 'input' as const, line })),
          this.queue.waitForEvent(race.signal).then(() => ({ source: 'event' as const, line: null })),
        ]);
        if (winner.source === 'event') continue;

        if (winner.line === null) {
          if (this.shutdown.signal.aborted) return null;
          this.log.info('Operator input closed; continuing with remote events only');
          this.input = undefined;
          continue;
        }

        const line = winner.line.trim();
        if (line.toLowerCase() === this.options.exitCommand.toLowerCase()) {
          this.stop();
          return null;
        }
        if (line === '') continue;
        return { prompt: line, origin: 'cli', originId: null };
      } finally {
        race.abort();
        this.shutdown.signal.removeEventListener('abort', cancelRace);
      }
    }
    return null;
  }

  private fromEvent(queued: QueuedEvent): TurnRequest {
    const event: ResourceEvent = queued.event;
    this.log.info(`Handling ${event.kind} on ${event.resourceId}`);
    switch (event.kind) {
      case 'CommentAdded':
        return {
          prompt: commentPrompt(event.payload.comment),
          origin: 'comment',
          originId: event.payload.comment.id || null,
          queued,
        };
      case 'ChannelMessage':
        return {
          prompt: channelPrompt(event.payload.message),
          origin: 'channel',
          originId: event.payload.message.ts,
          queued,
        };
      case 'DocChanged':
        return { prompt: docChangedPrompt(), origin: 'document', originId: null, queued };
    }
  }

  // -------------------------------------------------------------------------
  // Turn sequence
  // -------------------------------------------------------------------------

  private async runTurnSequence(request: TurnRequest): Promise<void> {
    this.currentState = {
      ...this.currentState,
      interactionOrigin: request.origin,
      originId: request.originId,
      iterationCount: 0,
      pendingEvent: request.queued?.event ?? null,
    };

    let outcome: TurnOutcome = 'failed';
    try {
      // Others may have edited since the last write
      await this.loadDocument();
      outcome = await this.driveTurns(request.prompt);
    } catch (error) {
      this.log.error('Turn sequence failed', error);
      await this.report(failedReport(errorMessage(error)));
    } finally {
      this.currentState = {
        ...this.currentState,
        interactionOrigin: 'cli',
        originId: null,
        iterationCount: 0,
        pendingEvent: null,
      };
      this.log.info(`Turn sequence ${outcome}`);
      request.queued?.settle?.(outcome);
    }
  }

  private async driveTurns(prompt: string): Promise<TurnOutcome> {
    let next = prompt;
    for (;;) {
      this.currentPhase = 'turn';
      await this.runTurn(next + documentContext(this.currentState.documentSnapshot));

      this.currentPhase = 'verifying';
      const verdict = await this.verify();

      if (verdict.isComplete) {
        const summary = await this.ask(SUMMARY_PROMPT);
        await this.report(completedReport(summary));
        return 'completed';
      }

      if (this.currentState.iterationCount >= this.options.maxIterations) {
        this.log.warn(`Giving up after ${this.currentState.iterationCount} continuations`);
        await this.report(await this.ask(DIFFICULTY_PROMPT));
        return 'abandoned';
      }

      this.currentState = { ...this.currentState, iterationCount: this.currentState.iterationCount + 1 };
      this.log.info(`Not done yet (continuation ${this.currentState.iterationCount}/${this.options.maxIterations})`);
      next = continuationPrompt(verdict.nextSteps);
    }
  }

  /**
   * One prompt/response iteration, including the free follow-ups it earns:
   * "continue" after tool calls and one corrective prompt after a malformed edit.
   */
  private async runTurn(prompt: string): Promise<void> {
    let message = prompt;
    let toolContinuations = 0;
    let corrected = false;

    for (;;) {
      const completion = await this.exchange(message);
      const edit = await this.applyEdits(completion.text);

      if (edit === 'malformed' && !corrected) {
        corrected = true;
        message = MALFORMED_EDIT_PROMPT;
        continue;
      }
      if (completion.toolCall) {
        if (toolContinuations < this.options.maxToolContinuations) {
          toolContinuations++;
          message = CONTINUE_PROMPT;
          continue;
        }
        this.log.warn(`Stopped continuing after ${toolContinuations} tool rounds`);
      }
      return;
    }
  }

  private async exchange(content: string): Promise<Completion> {
    const notice = this.pendingNotice;
    this.pendingNotice = '';
    this.conversation.append({ role: 'user', content: notice + content });

    const completion = await this.completion.complete(this.conversation.state());
    this.conversation.append(...completion.messages);
    return completion;
  }

  private async ask(prompt: string): Promise<string> {
    const completion = await this.exchange(prompt);
    return completion.text.trim();
  }

  private async verify(): Promise<Verdict> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.options.supervisorAttempts; attempt++) {
      try {
        return await this.supervisor.checkDone(this.currentState.documentSnapshot, this.conversation.messages);
      } catch (error) {
        lastError = error;
        this.log.warn(`Completion check failed (attempt ${attempt}/${this.options.supervisorAttempts})`, error);
      }
    }
    return {
      task: '',
      nextSteps: `The completion check could not be run (${errorMessage(lastError)}). Make sure the document reflects the task.`,
      isComplete: false,
    };
  }

  // -------------------------------------------------------------------------
  // Document edits
  // -------------------------------------------------------------------------

  private async applyEdits(text: string): Promise<EditResult> {
    const resource = this.resource;
    if (resource.kind !== 'document' || !hasFence(text)) return 'none';

    if (this.currentState.documentSnapshot === null) {
      try {
        this.setSnapshot(wrap(await resource.documents.readDoc(resource.id), this.options.maxChunkSize));
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) throw error;
        this.log.error('Not applying edit: the document could not be read', error);
        this.pendingNotice = unreadableDocumentNotice(error.message);
        return 'failed';
      }
    }

    let patched: string;
    try {
      patched = applyPatchSet(this.currentState.documentSnapshot ?? '', extractPatchBlocks(text));
    } catch (error) {
      if (error instanceof MalformedEditError) {
        this.log.warn(`Ignoring edit: ${error.message}`);
        return 'malformed';
      }
      throw error;
    }

    const finalText = unwrap(patched);
    this.pendingWrite = finalText;
    try {
      try {
        await resource.documents.rewriteDocument(resource.id, finalText);
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) throw error;
        this.log.error('Write-back failed', error);
        this.pendingNotice = writeBackNotice(error.message);
        return 'failed';
      }

      try {
        this.setSnapshot(wrap(await resource.documents.readDoc(resource.id), this.options.maxChunkSize));
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) throw error;
        this.log.warn(`Could not re-read the document after writing; using the written text: ${error.message}`);
        this.setSnapshot(wrap(finalText, this.options.maxChunkSize));
      }
    } finally {
      this.pendingWrite = undefined;
    }
    this.log.info('Document updated');
    return 'applied';
  }

  private async loadDocument(): Promise<void> {
    const resource = this.resource;
    if (resource.kind !== 'document') return;
    try {
      this.setSnapshot(wrap(await resource.documents.readDoc(resource.id), this.options.maxChunkSize));
    } catch (error) {
      if (!(error instanceof ProviderUnavailableError)) throw error;
      this.log.error('Could not read the document', error);
    }
  }

  private setSnapshot(snapshot: string): void {
    this.currentState = { ...this.currentState, documentSnapshot: snapshot };
  }

  // -------------------------------------------------------------------------
  // Reporting
  // -------------------------------------------------------------------------

  private async report(summary: string): Promise<void> {
    this.currentPhase = 'reporting';
    const { interactionOrigin, originId } = this.currentState;
    const resource = this.resource;

    try {
      switch (interactionOrigin) {
        case 'cli':
        case 'document':
          this.log.info(`Report: ${summary}`);
          this.input?.write(summary);
          return;
        case 'comment':
          if (resource.kind !== 'document') break;
          if (originId === null) {
            await resource.comments.createComment(resource.id, markOwnReply(summary));
          } else {
            await resource.comments.replyComment(resource.id, originId, markOwnReply(summary));
          }
          return;
        case 'channel':
          if (resource.kind !== 'channel') break;
          await resource.channel.post(resource.id, markOwnReply(markdownToSlack(summary)));
          return;
      }
      this.log.warn(`No way to report to ${interactionOrigin} from a ${resource.kind} session: ${summary}`);
    } catch (error) {
      this.log.error(`Could not deliver the report to ${interactionOrigin}`, error);
    }
  }
}
