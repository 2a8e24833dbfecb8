export { SessionController, DEFAULT_MAX_ITERATIONS } from './controller';
export type { SessionControllerDeps, SessionControllerOptions } from './controller';
export { EventQueue } from './event-queue';
export type { QueuedEvent } from './event-queue';
export { Conversation, AgentCompletionService } from './conversation';
export type { CompletionOptions } from './conversation';
export { CompletionSupervisor, DONE_TOOL, renderTranscript } from './supervisor';
export type { SupervisorOptions } from './supervisor';
export * from './prompts';
export type * from './types';
