export interface FieldIssue {
  field: string;
  reason: string;
}

export type ErrorCode =
  | 'duplicate_tool'
  | 'unknown_tool'
  | 'schema_validation'
  | 'extraction_parse'
  | 'model_unavailable';

export class BookingAgentError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = 'BookingAgentError';
  }
}

export class DuplicateToolError extends BookingAgentError {
  constructor(public readonly tool: string) {
    super(`Tool already registered: ${tool}`, 'duplicate_tool');
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends BookingAgentError {
  constructor(public readonly tool: string) {
    super(`Unknown tool: ${tool}`, 'unknown_tool');
    this.name = 'UnknownToolError';
  }
}

/**
 * Carries every violated field, so a caller can ask for one corrected
 * extraction instead of fixing fields one by one.
 */
export class SchemaValidationError extends BookingAgentError {
  constructor(
    public readonly tool: string,
    public readonly issues: FieldIssue[],
  ) {
    super(
      `Invalid arguments for ${tool}: ${issues.map((i) => `${i.field} (${i.reason})`).join(', ')}`,
      'schema_validation',
    );
    this.name = 'SchemaValidationError';
  }

  get fields(): string[] {
    return Array.from(new Set(this.issues.map((i) => i.field)));
  }
}

export class ExtractionParseError extends BookingAgentError {
  constructor(
    message: string,
    public readonly raw: string,
  ) {
    super(message, 'extraction_parse');
    this.name = 'ExtractionParseError';
  }
}

export class ModelUnavailableError extends BookingAgentError {
  constructor(message: string) {
    super(message, 'model_unavailable');
    this.name = 'ModelUnavailableError';
  }
}

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

/**
 * Maps backend client failures to a standard error shape for logs and replies.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error && typeof error === 'object') {
    const status = readStatus(error);
    if (status !== undefined) {
      if (status === 401 || status === 403) {
        return { code: 'auth_error', message: 'Authentication failed', details: { status }, causeId: ctx };
      }
      if (status === 404) {
        return { code: 'not_found', message: 'Resource not found', details: { status }, causeId: ctx };
      }
      if (status === 409 || status === 410 || status === 422) {
        return { code: 'declined', message: 'Request declined by backend', details: { status }, causeId: ctx };
      }
      if (status === 429) {
        return { code: 'rate_limit', message: 'Rate limit exceeded', details: { status }, causeId: ctx };
      }
      if (status >= 500) {
        return { code: 'server_error', message: 'Server error', details: { status }, causeId: ctx };
      }
      if (status >= 400) {
        return { code: 'bad_request', message: 'Request rejected', details: { status }, causeId: ctx };
      }
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TaskCancelledError') {
      return { code: 'timeout', message: 'Request timeout', causeId: ctx };
    }
    return { code: 'network_error', message: error.message, causeId: ctx };
  }

  return { code: 'unknown_error', message: 'Unknown error occurred', details: error, causeId: ctx };
}
