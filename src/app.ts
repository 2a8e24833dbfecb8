/**
 * App Lifecycle
 *
 * Builds one session per configured document or channel: MCP connections,
 * the capability registry, stores, watchers and the controller. Sessions run
 * concurrently and independently; the operator console is attached to the
 * first document session.
 */

import { logger, errorMessage, ConfigurationError } from './utils';
import type { TandemConfig, AgentConfig } from './config/schema';
import { MCPManager } from './mcp/manager';
import type { TransportFactory } from './mcp/transport';
import { ToolRegistry } from './tools/types';
import { LLMRouter } from './llm/router';
import { ToolLoopProvider } from './llm/tool-loop';
import type { LLMProvider } from './llm/types';
import { CapabilityRegistry } from './capabilities/registry';
import { CHANNEL_OPERATIONS, DOCUMENT_OPERATIONS } from './capabilities/operations';
import { clearStaleAcks, RemoteChatChannel, RemoteDocumentStore } from './capabilities/stores';
import { DocumentWatcher } from './watchers/document-watcher';
import { CommentWatcher } from './watchers/comment-watcher';
import { ChannelWatcher } from './watchers/channel-watcher';
import { SessionController } from './agent/controller';
import { EventQueue } from './agent/event-queue';
import { AgentCompletionService } from './agent/conversation';
import { CompletionSupervisor } from './agent/supervisor';
import type { InputSource } from './agent/types';

export interface SessionSpec {
  kind: 'document' | 'channel';
  id: string;
  agent: AgentConfig;
}

export interface Session {
  spec: SessionSpec;
  controller: SessionController;
  manager: MCPManager;
  hasConsole: boolean;
}

export interface AppOptions {
  /** Local operator input for the first document session. */
  input?: InputSource;
  /** LLM providers to use instead of the ones discovered from API keys. */
  providers?: LLMProvider[];
  createTransport?: TransportFactory;
}

/** Documents first, then channels, in configuration order. */
export function sessionSpecs(config: TandemConfig): SessionSpec[] {
  return [
    ...Object.entries(config.agents.documents).map(([id, agent]) => ({ kind: 'document' as const, id, agent })),
    ...Object.entries(config.agents.channels).map(([id, agent]) => ({ kind: 'channel' as const, id, agent })),
  ];
}

/**
 * Build a session. Connects to every configured MCP server and fails with a
 * ConfigurationError when an operation the session needs has no provider.
 */
export async function createSession(
  spec: SessionSpec,
  config: TandemConfig,
  router: LLMProvider,
  options: { input?: InputSource; createTransport?: TransportFactory } = {}
): Promise<Session> {
  const manager = new MCPManager(config.mcpServers, options.createTransport);
  await manager.connectAll();

  const capabilities = CapabilityRegistry.fromManager(manager, config.operations);
  const missing = capabilities.missing(spec.kind === 'document' ? DOCUMENT_OPERATIONS : CHANNEL_OPERATIONS);
  if (missing.length > 0) {
    await manager.disconnectAll();
    throw new ConfigurationError(
      `No MCP server provides ${missing.join(', ')} for ${spec.kind} ${spec.id}`,
      { missing }
    );
  }

  const tools = new ToolRegistry();
  manager.registerTools(tools);

  const completionOptions = {
    model: spec.agent.model ?? config.llm.defaultModel,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  };
  const completion = config.llm.transparentToolLoop
    ? new AgentCompletionService(
        new ToolLoopProvider(router, tools, { maxLoops: config.llm.maxToolLoops }),
        new ToolRegistry(),
        completionOptions
      )
    : new AgentCompletionService(router, tools, completionOptions);
  const supervisor = new CompletionSupervisor(router, { model: completionOptions.model });

  const queue = new EventQueue();
  const watcherOptions = { pollIntervalMs: config.watchers.pollIntervalMs };
  const controllerOptions = { ...config.session, instructions: spec.agent.instructions };

  if (spec.kind === 'document') {
    const store = new RemoteDocumentStore(capabilities);
    const controller = new SessionController({
      resource: { kind: 'document', id: spec.id, documents: store, comments: store },
      completion,
      supervisor,
      queue,
      input: options.input,
      options: controllerOptions,
    });
    controller.attach(
      new DocumentWatcher(spec.id, store, queue, {
        ...watcherOptions,
        debounceMs: config.watchers.debounceMs,
        ownTexts: () => controller.ownTexts(),
      }),
      new CommentWatcher(spec.id, store, queue, watcherOptions)
    );

    try {
      const cleared = await clearStaleAcks(store, spec.id);
      if (cleared > 0) logger.info(`Cleared ${cleared} stale acknowledgments on ${spec.id}`);
    } catch (error) {
      logger.warn(`Could not clear stale acknowledgments on ${spec.id}: ${errorMessage(error)}`);
    }

    return { spec, controller, manager, hasConsole: options.input !== undefined };
  }

  const channel = new RemoteChatChannel(capabilities);
  const controller = new SessionController({
    resource: { kind: 'channel', id: spec.id, channel },
    completion,
    supervisor,
    queue,
    input: options.input,
    options: controllerOptions,
  });
  controller.attach(
    new ChannelWatcher(spec.id, channel, queue, {
      ...watcherOptions,
      historyLimit: config.watchers.channelHistoryLimit,
    })
  );
  return { spec, controller, manager, hasConsole: options.input !== undefined };
}

export class App {
  private sessions: Session[] = [];
  private stopped = false;

  constructor(
    private readonly config: TandemConfig,
    private readonly options: AppOptions = {}
  ) {}

  /**
   * Start every configured session and resolve once all have ended. Ending
   * the console session stops the others.
   */
  async run(): Promise<void> {
    const specs = sessionSpecs(this.config);
    if (specs.length === 0) {
      throw new ConfigurationError('No agents configured: add entries under agents.documents or agents.channels');
    }

    const router = new LLMRouter(
      {
        defaultModel: this.config.llm.defaultModel,
        defaultProvider: this.config.llm.defaultProvider,
        fallback: this.config.llm.fallback,
      },
      { providers: this.options.providers }
    );

    const consoleIndex = specs.findIndex(spec => spec.kind === 'document');
    try {
      for (const [i, spec] of specs.entries()) {
        if (this.stopped) break;
        this.sessions.push(
          await createSession(spec, this.config, router, {
            input: i === consoleIndex ? this.options.input : undefined,
            createTransport: this.options.createTransport,
          })
        );
      }

      const results = await Promise.allSettled(
        this.sessions.map(async session => {
          if (this.stopped) session.controller.stop();
          await session.controller.run();
          if (session.hasConsole) this.stop();
        })
      );

      const failures: unknown[] = results.flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
      for (const failure of failures) logger.error('Session failed', failure);
      if (failures.length > 0) throw failures[0];
    } finally {
      await Promise.all(this.sessions.map(session => session.manager.disconnectAll()));
    }
  }

  stop(): void {
    this.stopped = true;
    for (const session of this.sessions) session.controller.stop();
  }
}
