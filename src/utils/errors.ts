// This module provides typed application errors that the dispatcher maps into tool results, JSON-RPC errors, or thrown misuse.

export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

// A failure a tool reports on purpose; it becomes an isError tool result, never a protocol error.
export class ToolError extends AppError {
  public constructor(message: string, details?: unknown) {
    super('tool_error', message, details);
    this.name = 'ToolError';
  }
}

export class RegistrationError extends AppError {
  public constructor(message: string, details?: unknown) {
    super('registration_error', message, details);
    this.name = 'RegistrationError';
  }
}

// Lifecycle misuse: processing while stopped, double start, double stop.
export class ServerStateError extends AppError {
  public constructor(message: string) {
    super('server_state_error', message);
    this.name = 'ServerStateError';
  }
}

// This helper normalizes unknown failures into an AppError without losing the original message.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError('internal_error', error.message);
  }

  return new AppError('internal_error', typeof error === 'string' ? error : 'An unexpected error occurred.');
}
