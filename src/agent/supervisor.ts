/**
 * Completion Supervisor
 *
 * One-shot check of whether the task is done, judged against the current
 * document rather than the assistant's own claims. The model is forced to
 * answer through a `done` tool so the verdict arrives as structured data.
 *
 * @module agent/supervisor
 */

import { z } from 'zod';
import { SupervisorError } from '../utils';
import type { LLMMessage, LLMProvider, ToolSchema } from '../llm/types';
import { toJsonSchema } from '../tools/types';
import { SUPERVISOR_INSTRUCTIONS, supervisorPrompt } from './prompts';
import type { Supervisor, Verdict } from './types';

const doneArgsSchema = z.object({
  task: z.string().describe('The task the user asked for, in one sentence'),
  next_steps: z.string().default('').describe('What is still missing, if anything'),
  is_complete: z.boolean().describe('True only if the document already reflects the finished task'),
});

export const DONE_TOOL: ToolSchema = {
  type: 'function',
  function: {
    name: 'done',
    description: 'Report whether the task is complete',
    parameters: toJsonSchema(doneArgsSchema),
  },
};

/** Plain-text rendering of the user and assistant turns. */
export function renderTranscript(messages: readonly LLMMessage[]): string {
  return messages
    .filter(m => (m.role === 'user' || m.role === 'assistant') && m.content.trim() !== '')
    .map(m => `${m.role}: ${m.content}`)
    .join('\n\n');
}

export interface SupervisorOptions {
  model?: string;
}

export class CompletionSupervisor implements Supervisor {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: SupervisorOptions = {}
  ) {}

  /**
   * @throws {SupervisorError} when the model does not call `done` with valid arguments.
   */
  async checkDone(snapshot: string | null, transcript: readonly LLMMessage[]): Promise<Verdict> {
    const response = await this.provider.completeWithTools({
      model: this.options.model,
      messages: [
        { role: 'system', content: SUPERVISOR_INSTRUCTIONS },
        { role: 'user', content: supervisorPrompt(renderTranscript(transcript), snapshot) },
      ],
      tools: [DONE_TOOL],
      toolChoice: { type: 'function', function: { name: 'done' } },
    });

    const call = response.toolCalls?.find(c => c.function.name === 'done');
    if (!call) {
      throw new SupervisorError('Supervisor answered without calling done', {
        preview: response.content.slice(0, 200),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(call.function.arguments);
    } catch {
      throw new SupervisorError('Supervisor verdict is not valid JSON', { arguments: call.function.arguments });
    }

    const parsed = doneArgsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SupervisorError('Supervisor verdict has an unexpected shape', parsed.error.issues);
    }

    return {
      task: parsed.data.task,
      nextSteps: parsed.data.next_steps,
      isComplete: parsed.data.is_complete,
    };
  }
}
