/**
 * Error types surfaced to callers of the agent
 */

export const ErrorCodes = {
  // Bad or missing configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Remote API failures
  API_ERROR: 'API_ERROR',
  ABORTED: 'ABORTED',

  // User-supplied callbacks
  TOOL_EXECUTION_ERROR: 'TOOL_EXECUTION_ERROR',

  // processPrompt called while another call is running
  PROMPT_IN_PROGRESS: 'PROMPT_IN_PROGRESS',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class AgentError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure reported by the Messages API (or the transport underneath it)
 */
export class ApiError extends AgentError {
  constructor(
    message: string,
    public status: number | undefined,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCodes.API_ERROR, options);
    this.name = 'ApiError';
  }
}

export class AbortError extends AgentError {
  constructor(message = 'Request was aborted', options?: { cause?: unknown }) {
    super(message, ErrorCodes.ABORTED, options);
    this.name = 'AbortError';
  }
}

/**
 * Thrown when a tool callback fails and no post-interceptor recovers it
 */
export class ToolExecutionError extends AgentError {
  constructor(
    message: string,
    public toolName: string,
    public toolUseId: string,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCodes.TOOL_EXECUTION_ERROR, options);
    this.name = 'ToolExecutionError';
  }
}

/**
 * Formats an unknown thrown value for a tool result or log line
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts = [error.message];
  if ('stderr' in error && typeof error.stderr === 'string') {
    parts.push(error.stderr);
  }
  if ('stdout' in error && typeof error.stdout === 'string') {
    parts.push(error.stdout);
  }
  const fullMessage = parts.filter(Boolean).join('\n');
  if (fullMessage.length <= 10000) {
    return fullMessage;
  }
  const halfLength = 5000;
  const start = fullMessage.slice(0, halfLength);
  const end = fullMessage.slice(-halfLength);
  return `${start}\n\n... [${fullMessage.length - 10000} characters truncated] ...\n\n${end}`;
}
