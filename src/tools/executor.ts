import { logger, errorMessage, UnknownToolError } from '../utils';
import type { ToolCall } from '../llm/types';
import type { ToolRegistry, ToolResult } from './types';

/** Tool output beyond this many characters is truncated before it reaches the model. */
export const MAX_TOOL_OUTPUT_CHARS = 100_000;

export interface ExecuteOptions {
  /** Throw UnknownToolError instead of returning an error result. */
  throwOnUnknown?: boolean;
}

function truncate(output: string): string {
  if (output.length <= MAX_TOOL_OUTPUT_CHARS) return output;
  const dropped = output.length - MAX_TOOL_OUTPUT_CHARS;
  return `${output.slice(0, MAX_TOOL_OUTPUT_CHARS)}\n... [truncated ${dropped} characters]`;
}

/**
 * Parse, validate and run one tool call against the registry. Failures come
 * back as error results so the model can react to them.
 */
export async function executeToolCall(
  toolCall: ToolCall,
  registry: ToolRegistry,
  options: ExecuteOptions = {}
): Promise<ToolResult> {
  const toolName = toolCall.function.name;

  const tool = registry.get(toolName);
  if (!tool) {
    if (options.throwOnUnknown) {
      throw new UnknownToolError(toolName);
    }
    return { output: '', error: `Unknown tool: ${toolName}`, isError: true };
  }

  let parsedArgs: unknown;
  try {
    parsedArgs = toolCall.function.arguments.trim() === '' ? {} : JSON.parse(toolCall.function.arguments);
  } catch {
    return {
      output: '',
      error: `Failed to parse tool arguments as JSON for '${toolName}': ${toolCall.function.arguments}`,
      isError: true,
    };
  }

  const validated = tool.inputSchema.safeParse(parsedArgs);
  if (!validated.success) {
    return {
      output: '',
      error: `Invalid arguments for '${toolName}': ${validated.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      isError: true,
    };
  }

  logger.debug(`Executing tool ${toolName}`, { id: toolCall.id });
  try {
    const result = await tool.execute(validated.data);
    return { ...result, output: truncate(result.output) };
  } catch (error) {
    return { output: '', error: `Tool execution failed: ${errorMessage(error)}`, isError: true };
  }
}

/** Render a result the way it is fed back to the model as a tool message. */
export function toolResultContent(result: ToolResult): string {
  if (!result.isError) return result.output;
  return `Error: ${result.error ?? 'unknown error'}${result.output ? `\n${result.output}` : ''}`;
}
