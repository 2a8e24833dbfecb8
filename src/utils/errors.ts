export interface SerializedError {
  code: string;
  message: string;
  timestamp: string;
  details?: unknown;
  stack?: string;
}

/**
 * Base error for everything tandem raises on purpose.
 */
export class TandemError extends Error {
  readonly code: string;
  readonly timestamp: string;
  readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'TandemError';
    this.code = code;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      details: this.details,
      stack: this.stack,
    };
  }
}

/** A response opened a fenced block but nothing in it could be applied. */
export class MalformedEditError extends TandemError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_EDIT', details);
    this.name = 'MalformedEditError';
  }
}

export class ProviderUnavailableError extends TandemError {
  readonly operation: string;

  constructor(operation: string, reason: string, details?: unknown) {
    super(`Capability ${operation} failed: ${reason}`, 'PROVIDER_UNAVAILABLE', details);
    this.name = 'ProviderUnavailableError';
    this.operation = operation;
  }
}

export class SupervisorError extends TandemError {
  constructor(message: string, details?: unknown) {
    super(message, 'SUPERVISOR_ERROR', details);
    this.name = 'SupervisorError';
  }
}

export class UnknownToolError extends TandemError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL', { toolName });
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class LoopBudgetExceededError extends TandemError {
  constructor(maxLoops: number) {
    super(`Tool loop exceeded ${maxLoops} rounds`, 'LOOP_BUDGET_EXCEEDED', { maxLoops });
    this.name = 'LoopBudgetExceededError';
  }
}

export class ValidationError extends TandemError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends TandemError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
