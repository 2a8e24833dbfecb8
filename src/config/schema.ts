/**
 * Zod Config Schema
 *
 * Validates the configuration file at load time. Every section has defaults,
 * so an empty file yields a working configuration.
 */

import { z } from 'zod';
import { DEFAULT_OPERATION_TOOLS } from '../capabilities/operations';

export const FallbackConfigSchema = z.object({
  enabled: z.boolean().default(true),
  providers: z.array(z.string()).default(['openai', 'anthropic']),
});

export const LLMConfigSchema = z.object({
  defaultModel: z.string().default('gpt-4o'),
  defaultProvider: z.string().default('openai'),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().default(4096),
  fallback: FallbackConfigSchema.default({}),
  // Resolve MCP tool calls inside the provider call instead of the session loop
  transparentToolLoop: z.boolean().default(false),
  maxToolLoops: z.number().int().positive().default(5),
});

export const SessionConfigSchema = z.object({
  maxIterations: z.number().int().nonnegative().default(5),
  maxChunkSize: z.number().int().positive().default(400),
  maxToolContinuations: z.number().int().nonnegative().default(10),
  supervisorAttempts: z.number().int().positive().default(2),
  exitCommand: z.string().min(1).default('exit'),
});

export const WatchersConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(10_000),
  debounceMs: z.number().int().nonnegative().default(30_000),
  channelHistoryLimit: z.number().int().positive().default(10),
});

export const OperationsConfigSchema = z.object({
  'read-doc': z.string().default(DEFAULT_OPERATION_TOOLS['read-doc']),
  'rewrite-document': z.string().default(DEFAULT_OPERATION_TOOLS['rewrite-document']),
  'read-comments': z.string().default(DEFAULT_OPERATION_TOOLS['read-comments']),
  'create-comment': z.string().default(DEFAULT_OPERATION_TOOLS['create-comment']),
  'reply-comment': z.string().default(DEFAULT_OPERATION_TOOLS['reply-comment']),
  'delete-reply': z.string().default(DEFAULT_OPERATION_TOOLS['delete-reply']),
  'channel-history': z.string().default(DEFAULT_OPERATION_TOOLS['channel-history']),
  'channel-post': z.string().default(DEFAULT_OPERATION_TOOLS['channel-post']),
  'channel-react': z.string().default(DEFAULT_OPERATION_TOOLS['channel-react']),
});

export const MCPServerConfigSchema = z
  .object({
    type: z.enum(['command', 'http']).default('command'),
    command: z.string().optional(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
    url: z.string().url().optional(),
    token: z.string().optional(),
  })
  .refine(s => (s.type === 'command' ? Boolean(s.command) : Boolean(s.url)), {
    message: "command servers need 'command', http servers need 'url'",
  });

export const AgentConfigSchema = z.object({
  model: z.string().optional(),
  instructions: z.string().optional(),
});

export const AgentsConfigSchema = z.object({
  // `doc-id:` with no body parses as null
  documents: z.record(z.string(), AgentConfigSchema.nullish().transform(v => v ?? {})).default({}),
  channels: z.record(z.string(), AgentConfigSchema.nullish().transform(v => v ?? {})).default({}),
});

export const TandemConfigSchema = z.object({
  version: z.number().int().default(1),
  llm: LLMConfigSchema.default({}),
  session: SessionConfigSchema.default({}),
  watchers: WatchersConfigSchema.default({}),
  operations: OperationsConfigSchema.default({}),
  mcpServers: z.record(z.string(), MCPServerConfigSchema).default({}),
  agents: AgentsConfigSchema.default({}),
});

export type TandemConfig = z.infer<typeof TandemConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type WatchersConfig = z.infer<typeof WatchersConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
