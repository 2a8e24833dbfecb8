export { ToolRegistry, toToolSchema, toJsonSchema } from './types';
export type { ToolDefinition, ToolResult, ToolCategory } from './types';
export { executeToolCall, toolResultContent, MAX_TOOL_OUTPUT_CHARS } from './executor';
export type { ExecuteOptions } from './executor';
