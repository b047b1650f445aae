/**
 * Error codes raised anywhere between startup and a delivered answer.
 */
export type PipelineErrorCode =
  | 'EMPTY_INPUT' // Blank query, re-prompt
  | 'SERVICE_TRANSIENT' // Timeout, rate limit, upstream 5xx
  | 'SERVICE_PERMANENT' // Bad credentials, malformed request
  | 'KNOWLEDGE_STORE' // Store missing, unreadable or invalid
  | 'CONFIG'; // Environment failed validation

export type ServiceErrorKind = 'transient' | 'permanent';

type PipelineErrorOptions = {
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;

  public readonly details?: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.details = options.details;
  }
}

export class EmptyInputError extends PipelineError {
  constructor() {
    super('EMPTY_INPUT', 'Query must not be empty.');
    this.name = 'EmptyInputError';
  }
}

export class ServiceError extends PipelineError {
  public readonly kind: ServiceErrorKind;

  public readonly status?: number;

  constructor(
    kind: ServiceErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(kind === 'transient' ? 'SERVICE_TRANSIENT' : 'SERVICE_PERMANENT', message, {
      details: options.status === undefined ? undefined : { status: options.status },
      cause: options.cause,
    });
    this.name = 'ServiceError';
    this.kind = kind;
    this.status = options.status;
  }
}

export class KnowledgeStoreError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('KNOWLEDGE_STORE', message, options);
    this.name = 'KnowledgeStoreError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

export const isTransientServiceError = (error: unknown): error is ServiceError =>
  error instanceof ServiceError && error.kind === 'transient';

export const isPermanentServiceError = (error: unknown): error is ServiceError =>
  error instanceof ServiceError && error.kind === 'permanent';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
