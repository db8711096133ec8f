export type AssistantErrorCode = 'catalog_load_failed' | 'llm_unavailable' | 'malformed_input';

export class AssistantError extends Error {
  constructor(
    message: string,
    public readonly code: AssistantErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AssistantError';
  }
}

/**
 * Raised while loading the store catalog. Fatal: nothing may serve traffic
 * without a valid catalog.
 */
export class CatalogLoadError extends AssistantError {
  constructor(message: string, details?: unknown) {
    super(message, 'catalog_load_failed', details);
    this.name = 'CatalogLoadError';
  }
}

export type LLMFailureReason =
  | 'timeout'
  | 'http'
  | 'network'
  | 'empty_response'
  | 'malformed_response'
  | 'not_configured'
  | 'circuit_open';

export class LLMUnavailableError extends AssistantError {
  constructor(
    public readonly reason: LLMFailureReason,
    message: string = `LLM unavailable: ${reason}`,
    public readonly status?: number,
  ) {
    super(message, 'llm_unavailable', status === undefined ? { reason } : { reason, status });
    this.name = 'LLMUnavailableError';
  }
}

export type MalformedInputReason = 'empty' | 'too_long' | 'missing_query';

export class MalformedInputError extends AssistantError {
  constructor(
    public readonly reason: MalformedInputReason,
    message: string,
  ) {
    super(message, 'malformed_input', { reason });
    this.name = 'MalformedInputError';
  }
}

export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}
