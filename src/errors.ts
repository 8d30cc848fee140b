/**
 * Error types raised while defining, resolving and running flows.
 */

export type FlowDefinitionErrorCode =
  | 'INVALID_STEP'
  | 'INVALID_CHAIN'
  | 'AGG_WITHOUT_MAP'
  | 'NESTED_FAN_OUT'
  | 'UNCLOSED_FAN_OUT'
  | 'DUPLICATE_STEP'
  | 'INVALID_SCHEDULE';

/**
 * Raised synchronously while a flow is being declared or resolved.
 * These are authoring mistakes and are never retried.
 */
export class FlowDefinitionError extends Error {
  constructor(
    public readonly code: FlowDefinitionErrorCode,
    message: string,
    public readonly stepName?: string
  ) {
    super(message);
    this.name = 'FlowDefinitionError';
  }
}

export type StoreErrorCode = 'NOT_FOUND' | 'IO_ERROR';

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    public readonly location: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Format zod-style issues the same way everywhere: `path: message; path: message`.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
